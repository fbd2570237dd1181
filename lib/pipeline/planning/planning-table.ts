import type { ChapterEntryWire, PlanningTableWire } from "../core/schemas";
import type { ChapterGroup, CoverageWarning, PlanningTable } from "../core/types";

/**
 * Short display label: the first two chapter titles, with an ellipsis
 * when there are more.
 */
export function groupLabel(groupId: string, chapterTitles: string[]): string {
  const titles = chapterTitles.map((t) => t.trim()).filter(Boolean);
  if (titles.length === 0) return groupId;
  return titles.slice(0, 2).join(", ") + (titles.length > 2 ? "..." : "");
}

function uniqueInOrder(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const v = value.trim();
    if (v && !seen.has(v)) {
      seen.add(v);
      out.push(v);
    }
  }
  return out;
}

/**
 * Build the domain table from the provider's JSON and attach coverage
 * warnings.
 */
export function planningTableFromWire(wire: PlanningTableWire): PlanningTable {
  const groups: ChapterGroup[] = wire.chapters.map((entry) => ({
    groupId: entry.group_id,
    groupType: entry.group_type,
    chapterNumbers: [...entry.chapter_numbers],
    chapterTitles: entry.chapter_titles.map((t) => t.trim()),
    label: groupLabel(entry.group_id, entry.chapter_titles),
    rationale: entry.content_summary.trim(),
    quadrants: uniqueInOrder(entry.thematic_quadrants),
  }));

  const overview = wire.book_overview;
  const totalChapters = overview.total_chapters;

  return {
    overview: {
      title: overview.title.trim(),
      scope: overview.scope.trim(),
      totalChapters,
      disciplines: uniqueInOrder(overview.disciplines),
      languages: uniqueInOrder(overview.languages),
    },
    groups,
    quadrants: uniqueInOrder(groups.flatMap((g) => g.quadrants)),
    tasks: wire.chapters.map((entry) => ({ groupId: entry.group_id, brief: entry.foresight_task.trim() })),
    implementationNotes: wire.implementation_notes?.trim() || null,
    warnings: checkCoverage(groups, totalChapters),
  };
}

export function chapterEntryToWire(table: PlanningTable, group: ChapterGroup): ChapterEntryWire {
  return {
    group_id: group.groupId,
    group_type: group.groupType,
    chapter_numbers: group.chapterNumbers,
    chapter_titles: group.chapterTitles,
    content_summary: group.rationale,
    thematic_quadrants: group.quadrants,
    foresight_task: taskBrief(table, group.groupId) ?? "",
  };
}

/**
 * Serialize back to the provider's JSON shape, for edit requests.
 */
export function planningTableToWire(table: PlanningTable): PlanningTableWire {
  return {
    book_overview: {
      title: table.overview.title,
      scope: table.overview.scope,
      total_chapters: table.overview.totalChapters,
      disciplines: table.overview.disciplines,
      languages: table.overview.languages,
    },
    chapters: table.groups.map((g) => chapterEntryToWire(table, g)),
    implementation_notes: table.implementationNotes,
  };
}

/**
 * Chapter references must not overlap and, when the overview reports a
 * chapter count, must cover 1..totalChapters. Violations are warnings.
 */
export function checkCoverage(groups: ChapterGroup[], totalChapters: number): CoverageWarning[] {
  const owners = new Map<number, string[]>();
  for (const group of groups) {
    for (const chapter of group.chapterNumbers) {
      const list = owners.get(chapter) ?? [];
      list.push(group.groupId);
      owners.set(chapter, list);
    }
  }

  const warnings: CoverageWarning[] = [];
  const chapters = [...owners.keys()].sort((a, b) => a - b);

  for (const chapter of chapters) {
    const groupIds = owners.get(chapter) ?? [];
    if (groupIds.length > 1) {
      warnings.push({ kind: "duplicate-chapter", chapter, groupIds });
    }
  }

  if (totalChapters > 0) {
    for (let chapter = 1; chapter <= totalChapters; chapter++) {
      if (!owners.has(chapter)) warnings.push({ kind: "missing-chapter", chapter });
    }
    for (const group of groups) {
      for (const chapter of group.chapterNumbers) {
        if (chapter < 1 || chapter > totalChapters) {
          warnings.push({ kind: "unknown-chapter", chapter, groupId: group.groupId });
        }
      }
    }
  }

  return warnings;
}

export function describeCoverageWarning(warning: CoverageWarning): string {
  switch (warning.kind) {
    case "duplicate-chapter":
      return `Chapter ${warning.chapter} appears in more than one group (${warning.groupIds.join(", ")})`;
    case "missing-chapter":
      return `Chapter ${warning.chapter} is not assigned to any group`;
    case "unknown-chapter":
      return `${warning.groupId} references chapter ${warning.chapter}, which the book overview does not list`;
  }
}

export function findGroup(table: PlanningTable, groupId: string): ChapterGroup | undefined {
  return table.groups.find((g) => g.groupId === groupId);
}

export function taskBrief(table: PlanningTable, groupId: string): string | undefined {
  return table.tasks.find((t) => t.groupId === groupId)?.brief;
}
