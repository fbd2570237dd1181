import type { PlanningTable } from "../core/types";
import { describeCoverageWarning, taskBrief } from "./planning-table";

export const PLANNING_TABLE_FILE_NAME = "planning_table.md";

/**
 * Render the planning table as a Markdown document for download.
 */
export function renderPlanningTableMarkdown(table: PlanningTable): string {
  const { overview } = table;
  const lines: string[] = [
    "# Foresight Planning Table",
    "",
    "## Book Overview",
    "",
    `**Title:** ${overview.title || "N/A"}`,
    `**Scope:** ${overview.scope || "N/A"}`,
    `**Total Chapters:** ${overview.totalChapters}`,
    `**Disciplines:** ${overview.disciplines.join(", ")}`,
    `**Languages:** ${overview.languages.join(", ")}`,
    "",
    "## Planning Table",
    "",
  ];

  for (const group of table.groups) {
    lines.push(
      `### ${group.groupId}`,
      `**Type:** ${group.groupType}`,
      `**Chapters:** ${group.chapterNumbers.join(", ")}`,
      `**Titles:** ${group.chapterTitles.join(", ")}`,
      "",
      `**Summary:** ${group.rationale}`,
      "",
      `**Thematic Quadrants:** ${group.quadrants.join(", ")}`,
      "",
      "**Foresight Task:**",
      taskBrief(table, group.groupId) ?? "",
      "",
      "---",
      ""
    );
  }

  if (table.warnings.length > 0) {
    lines.push("## Coverage Warnings", "");
    for (const warning of table.warnings) {
      lines.push(`- ${describeCoverageWarning(warning)}`);
    }
    lines.push("");
  }

  if (table.implementationNotes) {
    lines.push("## Implementation Notes", "", table.implementationNotes, "");
  }

  return lines.join("\n");
}
