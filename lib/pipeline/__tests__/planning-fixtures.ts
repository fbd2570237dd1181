import type { PlanningTableWire } from "../core/schemas";
import type { PlanningTable } from "../core/types";
import { planningTableFromWire } from "../planning/planning-table";

export const WIRE_TABLE: PlanningTableWire = {
  book_overview: {
    title: "Rivers of Change",
    scope: "Hydrology and urban planning",
    total_chapters: 3,
    disciplines: ["Hydrology", "Urban planning"],
    languages: ["English"],
  },
  chapters: [
    {
      group_id: "GROUP_A",
      group_type: "GROUP",
      chapter_numbers: [1, 2],
      chapter_titles: ["Flood Plains", "Channels"],
      content_summary: "Chapters on how rivers shaped settlement.",
      thematic_quadrants: ["Climate", "Infrastructure", "Governance", "Economy"],
      foresight_task: "Analyze flood risk futures.",
    },
    {
      group_id: "STANDALONE_1",
      group_type: "STANDALONE",
      chapter_numbers: [3],
      chapter_titles: ["Deltas"],
      content_summary: "Delta ecosystems.",
      thematic_quadrants: ["Ecology", "Climate", "Migration"],
      foresight_task: "Explore delta futures.",
    },
  ],
  implementation_notes: "Chapter 3 is short.",
};

export function sampleTable(): PlanningTable {
  return planningTableFromWire(WIRE_TABLE);
}
