import { z } from "zod";
import type { CampusMap, CourseSection, InformationData, Location } from "../types.js";

export const dayOfWeekSchema = z.enum([
  "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday",
]);

const bookableItemSchema = z.object({
  item_name: z.string().min(1),
  seats: z.array(z.string()).optional(),
  properties: z.array(z.string()).optional(),
});

// Floors map to room names, e.g. { "Floor 1": ["Lobby", "Cafe"] }
const mapNodeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  type: z.string().default("Unknown"),
  zone: z.string().default("Unknown"),
  amenities: z.array(z.string()).default([]),
  internal_amenities: z.record(z.array(z.string())).default({}),
  bookable_items: z.array(bookableItemSchema).default([]),
});

const edgePropertyValueSchema = z.union([z.string(), z.boolean(), z.array(z.string())]);

const mapEdgeSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  time_cost: z.number().nonnegative(),
  properties: z.record(edgePropertyValueSchema).default({}),
  one_way: z.boolean().default(false),
});

export const mapFileSchema = z.object({
  nodes: z.array(mapNodeSchema).min(1),
  edges: z.array(mapEdgeSchema).default([]),
  building_complexes: z.array(z.object({
    name: z.string().min(1),
    member_ids: z.array(z.string()),
  })).default([]),
}).superRefine((file, ctx) => {
  const ids = new Set<string>();
  for (const node of file.nodes) {
    if (ids.has(node.id)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate location id '${node.id}'` });
    ids.add(node.id);
  }
  for (const edge of file.edges) {
    for (const end of [edge.source, edge.target]) {
      if (!ids.has(end)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Edge ${edge.source}->${edge.target} references unknown location '${end}'` });
      }
    }
  }
});

export const courseSectionSchema = z.object({
  section_id: z.string().min(1),
  course_code: z.string().min(1),
  course_name: z.string().min(1),
  credits: z.number().nonnegative(),
  type: z.string().default("Elective"),
  instructor: z.object({ id: z.string(), name: z.string() }),
  schedule: z.object({
    weeks: z.object({ start: z.number().int(), end: z.number().int() }),
    days: z.array(dayOfWeekSchema),
    time: z.string(),
    location: z.object({ building_id: z.string(), building_name: z.string(), room: z.string() }),
  }),
  description: z.string().default(""),
  prerequisites: z.array(z.string()).default([]),
  popularity_index: z.number().int().min(0).max(100),
  seats_left: z.number().int().nonnegative(),
});

export const coursesFileSchema = z.object({
  courses: z.array(courseSectionSchema),
}).superRefine((file, ctx) => {
  const ids = new Set<string>();
  for (const c of file.courses) {
    if (ids.has(c.section_id)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate section id '${c.section_id}'` });
    ids.add(c.section_id);
  }
});

export type MapFile = z.infer<typeof mapFileSchema>;

export function toCampusMap(file: MapFile): CampusMap {
  const locations: Location[] = file.nodes.map(node => ({
    id: node.id,
    name: node.name,
    aliases: node.aliases,
    zone: node.zone,
    type: node.type,
    amenities: node.amenities,
    sub_rooms: Object.entries(node.internal_amenities)
      .flatMap(([floor, rooms]) => rooms.map(name => ({ floor, name }))),
    bookable_items: node.bookable_items,
  }));
  return { locations, edges: file.edges, complexes: file.building_complexes };
}

export function toCourseSections(file: z.infer<typeof coursesFileSchema>): CourseSection[] {
  return file.courses;
}

const articleSchema = z.object({
  article_id: z.string().min(1),
  title: z.string().min(1),
  body: z.string(),
});

const bookSchema = z.object({
  book_title: z.string().min(1),
  chapters: z.array(z.object({
    chapter_title: z.string().min(1),
    sections: z.array(z.object({
      section_title: z.string().min(1),
      articles: z.array(articleSchema).default([]),
    })).default([]),
  })).default([]),
});

export const informationFileSchema = z.object({
  books: z.array(bookSchema).default([]),
  clubs: z.array(z.object({
    club_id: z.string().min(1),
    club_name: z.string().min(1),
    category: z.string().min(1),
    description: z.string().default(""),
    recruitment_info: z.string().default(""),
  })).default([]),
  advisors: z.array(z.object({
    advisor_id: z.string().min(1),
    name: z.string().min(1),
    email: z.string().min(1),
    research_area: z.object({
      level_1: z.string(),
      level_2: z.string(),
      tags: z.array(z.string()).default([]),
    }),
    representative_work: z.array(z.string()).default([]),
  })).default([]),
  library_books: z.array(z.object({
    title: z.string().min(1),
    author: z.string().min(1),
    call_number: z.string().min(1),
    category: z.string().min(1),
    status: z.enum(["Available", "Checked Out"]),
    location: z.string().default(""),
  })).default([]),
}).superRefine((file, ctx) => {
  const articleIds = new Set<string>();
  for (const book of file.books) {
    for (const article of book.chapters.flatMap(c => c.sections).flatMap(s => s.articles)) {
      if (articleIds.has(article.article_id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate article id '${article.article_id}'` });
      }
      articleIds.add(article.article_id);
    }
  }
});

export function toInformationData(file: z.infer<typeof informationFileSchema>): InformationData {
  return file;
}
