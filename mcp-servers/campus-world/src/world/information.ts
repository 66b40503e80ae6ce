import { fail, ok, type OpResult } from "../result.js";
import type {
  AdvisorProfile, Article, Book, BookChapter, BookSection, Club, InformationData, LibraryBook, ResearchArea,
} from "../types.js";

export type EntityType = "club" | "advisor";

export interface AdvisorMatch {
  name: string;
  research_area: ResearchArea;
  representative_work: string[];
}

function same(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.trim().toLowerCase());
}

function isEntityType(value: string): value is EntityType {
  return value === "club" || value === "advisor";
}

function formatBook(book: LibraryBook, withCategory: boolean): string {
  const where = withCategory ? `${book.category}, Call Number: ${book.call_number}` : `Call Number: ${book.call_number}`;
  return `- "${book.title}" by ${book.author} (${where}) [${book.status}]`;
}

/**
 * Read-only campus references: handbooks browsed chapter by chapter, the club
 * and advisor directory, and the library catalog.
 */
export class InformationDesk {
  constructor(private readonly data: InformationData) {}

  private findBook(title: string): Book | undefined {
    return this.data.books.find(b => same(b.book_title, title));
  }

  /** The chapter, or why it cannot be found. */
  private findChapter(bookTitle: string, chapterTitle: string): { book: Book; chapter: BookChapter } | string {
    const book = this.findBook(bookTitle);
    if (!book) return `Book '${bookTitle}' not found.`;
    const chapter = book.chapters.find(c => same(c.chapter_title, chapterTitle));
    if (!chapter) return `Chapter '${chapterTitle}' not found in book '${bookTitle}'.`;
    return { book, chapter };
  }

  listChapters(bookTitle: string): OpResult<{ book_title: string; chapters: string[] }> {
    if (!bookTitle) return fail("VALIDATION", "Book title is required.");
    const book = this.findBook(bookTitle);
    if (!book) return fail("NOT_FOUND", `Book '${bookTitle}' not found.`);
    const chapters = book.chapters.map(c => c.chapter_title);
    const message = chapters.length > 0
      ? `Book '${book.book_title}' contains the following chapters: ${chapters.join(", ")}.`
      : `Book '${book.book_title}' has no chapters.`;
    return ok(message, { book_title: book.book_title, chapters });
  }

  listSections(
    bookTitle: string,
    chapterTitle: string,
  ): OpResult<{ book_title: string; chapter_title: string; sections: string[] }> {
    if (!bookTitle || !chapterTitle) return fail("VALIDATION", "Both book title and chapter title are required.");
    const found = this.findChapter(bookTitle, chapterTitle);
    if (typeof found === "string") return fail("NOT_FOUND", found);
    const { book, chapter } = found;
    const sections = chapter.sections.map(s => s.section_title);
    const message = sections.length > 0
      ? `Chapter '${chapter.chapter_title}' in book '${book.book_title}' contains the following sections: ${sections.join(", ")}.`
      : `Chapter '${chapter.chapter_title}' in book '${book.book_title}' has no sections.`;
    return ok(message, { book_title: book.book_title, chapter_title: chapter.chapter_title, sections });
  }

  listArticles(
    bookTitle: string,
    chapterTitle: string,
    sectionTitle: string,
  ): OpResult<{ book_title: string; chapter_title: string; section_title: string; articles: string[] }> {
    if (!bookTitle || !chapterTitle || !sectionTitle) {
      return fail("VALIDATION", "Book title, chapter title, and section title are all required.");
    }
    const found = this.findChapter(bookTitle, chapterTitle);
    if (typeof found === "string") return fail("NOT_FOUND", found);
    const { book, chapter } = found;
    const section: BookSection | undefined = chapter.sections.find(s => same(s.section_title, sectionTitle));
    if (!section) return fail("NOT_FOUND", `Section '${sectionTitle}' not found in chapter '${chapterTitle}'.`);

    const articles = section.articles.map(a => a.title);
    const message = articles.length > 0
      ? `Section '${section.section_title}' contains the following articles: ${articles.join(", ")}.`
      : `Section '${section.section_title}' has no articles.`;
    return ok(message, {
      book_title: book.book_title,
      chapter_title: chapter.chapter_title,
      section_title: section.section_title,
      articles,
    });
  }

  /** `by` is "title" (case-insensitive) or "id" (exact). */
  viewArticle(identifier: string, by: string): OpResult<Article> {
    if (!identifier || !by) return fail("VALIDATION", "Both identifier and search method ('by') are required.");
    if (by !== "title" && by !== "id") return fail("VALIDATION", "Search method must be either 'title' or 'id'.");

    const articles = this.data.books
      .flatMap(b => b.chapters)
      .flatMap(c => c.sections)
      .flatMap(s => s.articles);
    const article = articles.find(a => by === "title" ? same(a.title, identifier) : a.article_id === identifier);
    if (!article) return fail("NOT_FOUND", `Article with ${by} '${identifier}' not found.`);
    return ok(`Article: ${article.title}\n\n${article.body}`, { ...article });
  }

  /**
   * Clubs match their category exactly. Advisors match one research level
   * exactly, or with no level any level or tag by substring.
   */
  listByCategory(
    category: string,
    entityType: string,
    level?: string,
  ): OpResult<{ clubs: string[] } | { advisors: AdvisorMatch[] }> {
    if (!category || !entityType) return fail("VALIDATION", "Both category and entity_type are required.");
    if (!isEntityType(entityType)) return fail("VALIDATION", "Entity type must be either 'club' or 'advisor'.");

    if (entityType === "club") {
      const clubs = this.data.clubs.filter(c => same(c.category, category)).map(c => c.club_name);
      const message = clubs.length > 0
        ? `Clubs in category '${category}': ${clubs.join(", ")}.`
        : `No clubs found in category '${category}'.`;
      return ok(message, { clubs });
    }

    if (level !== undefined && level !== "level_1" && level !== "level_2") {
      return fail("VALIDATION", "Level must be either 'level_1' or 'level_2'.");
    }
    const matches = (a: AdvisorProfile): boolean => {
      const area = a.research_area;
      if (level !== undefined) return same(area[level], category);
      return contains(area.level_1, category) || contains(area.level_2, category) ||
        area.tags.some(t => contains(t, category));
    };
    const advisors = this.data.advisors.filter(matches).map(a => ({
      name: a.name,
      research_area: { ...a.research_area, tags: [...a.research_area.tags] },
      representative_work: [...a.representative_work],
    }));
    const message = advisors.length > 0
      ? [`Found ${advisors.length} advisor(s) in category '${category}':`,
        ...advisors.map(a => `- ${a.name} (Research: ${a.research_area.level_2})`)].join("\n")
      : `No advisors found in category '${category}'.`;
    return ok(message, { advisors });
  }

  queryByIdentifier(identifier: string, by: string, entityType: string): OpResult<Club | AdvisorProfile> {
    if (!identifier || !by || !entityType) {
      return fail("VALIDATION", "Identifier, search method ('by'), and entity_type are all required.");
    }
    if (by !== "name" && by !== "id") return fail("VALIDATION", "Search method must be either 'name' or 'id'.");
    if (!isEntityType(entityType)) return fail("VALIDATION", "Entity type must be either 'club' or 'advisor'.");

    if (entityType === "club") {
      const club = this.data.clubs.find(c => by === "name" ? same(c.club_name, identifier) : c.club_id === identifier);
      if (!club) return fail("NOT_FOUND", `Club with ${by} '${identifier}' not found.`);
      return ok([
        "Club Details:",
        `Name: ${club.club_name}`,
        `ID: ${club.club_id}`,
        `Category: ${club.category}`,
        `Description: ${club.description}`,
        `Recruitment Info: ${club.recruitment_info}`,
      ].join("\n"), { ...club });
    }

    const advisor = this.data.advisors.find(a => by === "name" ? same(a.name, identifier) : a.advisor_id === identifier);
    if (!advisor) return fail("NOT_FOUND", `Advisor with ${by} '${identifier}' not found.`);
    return ok([
      "Advisor Details:",
      `Name: ${advisor.name}`,
      `ID: ${advisor.advisor_id}`,
      `Email: ${advisor.email}`,
      `Research Area: ${advisor.research_area.level_2}`,
      `Representative Work: ${advisor.representative_work.join(", ")}`,
    ].join("\n"), {
      ...advisor,
      research_area: { ...advisor.research_area, tags: [...advisor.research_area.tags] },
      representative_work: [...advisor.representative_work],
    });
  }

  listBooksByCategory(category: string): OpResult<{ books: LibraryBook[] }> {
    if (!category) return fail("VALIDATION", "Category is required.");
    const books = this.data.library_books.filter(b => same(b.category, category)).map(b => ({ ...b }));
    const message = books.length > 0
      ? [`Found ${books.length} book(s) in category '${category}':`, ...books.map(b => formatBook(b, false))].join("\n")
      : `No books found in category '${category}'.`;
    return ok(message, { books });
  }

  searchBooks(query: string, searchType = "title"): OpResult<{ books: LibraryBook[] }> {
    if (!query) return fail("VALIDATION", "Search query is required.");
    if (searchType !== "title" && searchType !== "author") {
      return fail("VALIDATION", "Search type must be either 'title' or 'author'.");
    }
    const books = this.data.library_books
      .filter(b => contains(searchType === "title" ? b.title : b.author, query))
      .map(b => ({ ...b }));
    const message = books.length > 0
      ? [`Found ${books.length} book(s) matching '${query}' in ${searchType}:`, ...books.map(b => formatBook(b, true))].join("\n")
      : `No books found matching '${query}' in ${searchType}.`;
    return ok(message, { books });
  }
}
