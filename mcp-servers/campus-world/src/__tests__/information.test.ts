import { describe, it, expect, beforeAll } from "vitest";
import { loadCampusData } from "../data/loader.js";
import { InformationDesk } from "../world/information.js";

let desk: InformationDesk;

beforeAll(async () => {
  const data = await loadCampusData();
  desk = new InformationDesk(data.information);
});

describe("handbooks", () => {
  it("lists chapters by case-insensitive book title", () => {
    const result = desk.listChapters("student handbook");
    expect(result.status).toBe("success");
    expect(result.message).toBe(
      "Book 'Student Handbook' contains the following chapters: Chapter 1: Campus Life, Chapter 2: Academic Rules.",
    );
    expect(result.data).toEqual({
      book_title: "Student Handbook",
      chapters: ["Chapter 1: Campus Life", "Chapter 2: Academic Rules"],
    });
  });

  it("reports unknown books and chapters as not found", () => {
    expect(desk.listChapters("Cookbook")).toMatchObject({ error_code: "NOT_FOUND", message: "Book 'Cookbook' not found." });
    expect(desk.listSections("Student Handbook", "Chapter 9")).toMatchObject({
      error_code: "NOT_FOUND",
      message: "Chapter 'Chapter 9' not found in book 'Student Handbook'.",
    });
    expect(desk.listArticles("Student Handbook", "Chapter 1: Campus Life", "Section 1.9")).toMatchObject({
      error_code: "NOT_FOUND",
      message: "Section 'Section 1.9' not found in chapter 'Chapter 1: Campus Life'.",
    });
  });

  it("lists the sections of a chapter", () => {
    const result = desk.listSections("Student Handbook", "Chapter 2: Academic Rules");
    expect(result.data?.sections).toEqual(["Section 2.1: Course Registration", "Section 2.2: Academic Integrity"]);
  });

  it("lists article titles and says so when a section is empty", () => {
    const housing = desk.listArticles("Student Handbook", "Chapter 1: Campus Life", "Section 1.1: Housing");
    expect(housing.message).toBe("Section 'Section 1.1: Housing' contains the following articles: Quiet Hours, Guest Policy.");
    expect(housing.data?.articles).toEqual(["Quiet Hours", "Guest Policy"]);

    const integrity = desk.listArticles("Student Handbook", "Chapter 2: Academic Rules", "Section 2.2: Academic Integrity");
    expect(integrity.status).toBe("success");
    expect(integrity.message).toBe("Section 'Section 2.2: Academic Integrity' has no articles.");
    expect(integrity.data?.articles).toEqual([]);
  });

  it("requires every title when listing articles", () => {
    expect(desk.listArticles("Student Handbook", "", "Section 1.1: Housing").error_code).toBe("VALIDATION");
  });
});

describe("view_article", () => {
  it("finds an article by title ignoring case", () => {
    const result = desk.viewArticle("quiet hours", "title");
    expect(result.message).toBe(
      "Article: Quiet Hours\n\nQuiet hours in all dormitories run from 22:00 to 07:00 on weekdays and from 23:00 to 08:00 on weekends.",
    );
    expect(result.data?.article_id).toBe("hb_housing_001");
  });

  it("matches ids exactly", () => {
    expect(desk.viewArticle("cs101_001", "id").data?.title).toBe("Names and Values");
    expect(desk.viewArticle("HB_HOUSING_001", "id")).toMatchObject({
      status: "failure",
      error_code: "NOT_FOUND",
      message: "Article with id 'HB_HOUSING_001' not found.",
    });
  });

  it("rejects other lookup methods", () => {
    expect(desk.viewArticle("Quiet Hours", "author")).toMatchObject({
      error_code: "VALIDATION",
      message: "Search method must be either 'title' or 'id'.",
    });
  });
});

describe("clubs and advisors", () => {
  it("lists clubs of a category in file order", () => {
    const result = desk.listByCategory("Academic", "club");
    expect(result.message).toBe("Clubs in category 'Academic': Robotics Club, Debate Society.");
    expect(result.data).toEqual({ clubs: ["Robotics Club", "Debate Society"] });
  });

  it("answers an empty club category with success", () => {
    const result = desk.listByCategory("Chess", "club");
    expect(result.status).toBe("success");
    expect(result.message).toBe("No clubs found in category 'Chess'.");
  });

  it("matches advisors on any level or tag by substring without a level", () => {
    const result = desk.listByCategory("graph", "advisor");
    expect(result.message).toBe("Found 1 advisor(s) in category 'graph':\n- Prof. Birch (Research: Algorithms)");
    expect(result.data).toEqual({
      advisors: [{
        name: "Prof. Birch",
        research_area: { level_1: "Computer Science", level_2: "Algorithms", tags: ["Graph Search", "Data Structures"] },
        representative_work: ["Shortest Paths with Constraints", "Heaps Revisited"],
      }],
    });
  });

  it("matches one level exactly when a level is given", () => {
    const exact = desk.listByCategory("Computer Science", "advisor", "level_1");
    expect(exact.message).toBe(
      "Found 2 advisor(s) in category 'Computer Science':\n- Dr. Maple (Research: Programming Languages)\n" +
      "- Prof. Birch (Research: Algorithms)",
    );
    expect(desk.listByCategory("Computer", "advisor", "level_1").message).toBe("No advisors found in category 'Computer'.");
  });

  it("validates the entity type and level", () => {
    expect(desk.listByCategory("Academic", "building")).toMatchObject({
      error_code: "VALIDATION",
      message: "Entity type must be either 'club' or 'advisor'.",
    });
    expect(desk.listByCategory("Algorithms", "advisor", "level_3")).toMatchObject({
      error_code: "VALIDATION",
      message: "Level must be either 'level_1' or 'level_2'.",
    });
  });

  it("shows advisor details by id", () => {
    const result = desk.queryByIdentifier("T001", "id", "advisor");
    expect(result.message).toBe([
      "Advisor Details:",
      "Name: Dr. Maple",
      "ID: T001",
      "Email: maple@campus.edu",
      "Research Area: Programming Languages",
      "Representative Work: Gradual Typing in Practice",
    ].join("\n"));
  });

  it("shows club details by case-insensitive name", () => {
    const result = desk.queryByIdentifier("chess club", "name", "club");
    expect(result.message).toBe([
      "Club Details:",
      "Name: Chess Club",
      "ID: C002",
      "Category: Recreation",
      "Description: Casual and tournament chess every Thursday evening.",
      "Recruitment Info: No experience needed.",
    ].join("\n"));
    expect(desk.queryByIdentifier("C099", "id", "club")).toMatchObject({
      error_code: "NOT_FOUND",
      message: "Club with id 'C099' not found.",
    });
  });
});

describe("library catalog", () => {
  it("lists books of a category with call numbers and status", () => {
    const result = desk.listBooksByCategory("computer science");
    expect(result.message).toBe([
      "Found 2 book(s) in category 'computer science':",
      "- \"Data Structures Explained\" by R. Birch (Call Number: QA76.9 B57) [Available]",
      "- \"Programming from First Principles\" by L. Maple (Call Number: QA76.6 M37) [Checked Out]",
    ].join("\n"));
  });

  it("searches by author substring", () => {
    const result = desk.searchBooks("cedar", "author");
    expect(result.message).toBe(
      "Found 1 book(s) matching 'cedar' in author:\n" +
      "- \"Calculus Workbook\" by D. Cedar (Mathematics, Call Number: QA303 C43) [Available]",
    );
    expect(result.data?.books[0]?.location).toBe("Main Library, Floor 2");
  });

  it("searches titles by default and succeeds with no matches", () => {
    const result = desk.searchBooks("Physics");
    expect(result.status).toBe("success");
    expect(result.message).toBe("No books found matching 'Physics' in title.");
    expect(result.data).toEqual({ books: [] });
  });

  it("rejects unknown search types", () => {
    expect(desk.searchBooks("Calculus", "isbn").error_code).toBe("VALIDATION");
  });

  it("hands out copies of catalog entries", () => {
    const first = desk.listBooksByCategory("History").data?.books[0];
    if (first) first.status = "Checked Out";
    expect(desk.listBooksByCategory("History").data?.books[0]?.status).toBe("Available");
  });
});
