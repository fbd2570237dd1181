/**
 * Zod schemas for the provider-facing JSON.
 *
 * The model answers the analysis and edit prompts in the snake_case shape
 * below; lib/pipeline/planning converts it to the domain PlanningTable.
 */

import { z } from "zod/v4";

const upperCaseTrimmed = (value: unknown): unknown =>
  typeof value === "string" ? value.trim().toUpperCase() : value;

const nullToEmptyArray = (value: unknown): unknown => (value == null ? [] : value);

export const bookOverviewWireSchema = z.object({
  title: z.string(),
  scope: z.string().default(""),
  total_chapters: z.coerce.number().int().min(0),
  disciplines: z.preprocess(nullToEmptyArray, z.array(z.string())),
  languages: z.preprocess(nullToEmptyArray, z.array(z.string())),
});

export const chapterEntryWireSchema = z.object({
  group_id: z.string().trim().min(1),
  group_type: z.preprocess(upperCaseTrimmed, z.enum(["GROUP", "STANDALONE"])),
  chapter_numbers: z.array(z.coerce.number().int()),
  chapter_titles: z.preprocess(nullToEmptyArray, z.array(z.string())),
  content_summary: z.string().default(""),
  thematic_quadrants: z.preprocess(nullToEmptyArray, z.array(z.string())),
  foresight_task: z.string().default(""),
});

export const planningTableWireSchema = z.object({
  book_overview: bookOverviewWireSchema,
  chapters: z.array(chapterEntryWireSchema).min(1),
  implementation_notes: z.string().nullable().optional(),
});

export type BookOverviewWire = z.infer<typeof bookOverviewWireSchema>;
export type ChapterEntryWire = z.infer<typeof chapterEntryWireSchema>;
export type PlanningTableWire = z.infer<typeof planningTableWireSchema>;
