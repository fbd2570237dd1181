import { describe, it, expect } from "vitest";
import {
  checkCoverage,
  describeCoverageWarning,
  findGroup,
  groupLabel,
  planningTableFromWire,
  planningTableToWire,
  taskBrief,
} from "../planning-table";
import type { ChapterGroup } from "../../core/types";
import { WIRE_TABLE, sampleTable } from "../../__tests__/planning-fixtures";

function group(groupId: string, chapterNumbers: number[]): ChapterGroup {
  return {
    groupId,
    groupType: chapterNumbers.length > 1 ? "GROUP" : "STANDALONE",
    chapterNumbers,
    chapterTitles: [],
    label: groupId,
    rationale: "",
    quadrants: [],
  };
}

describe("planningTableFromWire", () => {
  it("builds the domain table", () => {
    const table = sampleTable();
    expect(table.overview).toEqual({
      title: "Rivers of Change",
      scope: "Hydrology and urban planning",
      totalChapters: 3,
      disciplines: ["Hydrology", "Urban planning"],
      languages: ["English"],
    });
    expect(table.groups[0]).toEqual({
      groupId: "GROUP_A",
      groupType: "GROUP",
      chapterNumbers: [1, 2],
      chapterTitles: ["Flood Plains", "Channels"],
      label: "Flood Plains, Channels",
      rationale: "Chapters on how rivers shaped settlement.",
      quadrants: ["Climate", "Infrastructure", "Governance", "Economy"],
    });
    expect(table.tasks).toEqual([
      { groupId: "GROUP_A", brief: "Analyze flood risk futures." },
      { groupId: "STANDALONE_1", brief: "Explore delta futures." },
    ]);
    expect(table.implementationNotes).toBe("Chapter 3 is short.");
    expect(table.warnings).toEqual([]);
  });

  it("collects the quadrant vocabulary in first-appearance order", () => {
    expect(sampleTable().quadrants).toEqual([
      "Climate",
      "Infrastructure",
      "Governance",
      "Economy",
      "Ecology",
      "Migration",
    ]);
  });

  it("treats blank implementation notes as absent", () => {
    expect(planningTableFromWire({ ...WIRE_TABLE, implementation_notes: "  " }).implementationNotes).toBeNull();
    expect(planningTableFromWire({ ...WIRE_TABLE, implementation_notes: null }).implementationNotes).toBeNull();
  });

  it("attaches coverage warnings", () => {
    const wire = { ...WIRE_TABLE, book_overview: { ...WIRE_TABLE.book_overview, total_chapters: 4 } };
    expect(planningTableFromWire(wire).warnings).toEqual([{ kind: "missing-chapter", chapter: 4 }]);
  });

  it("survives a trip through the wire shape", () => {
    const table = sampleTable();
    expect(planningTableFromWire(planningTableToWire(table))).toEqual(table);
  });
});

describe("groupLabel", () => {
  it("joins the first two titles", () => {
    expect(groupLabel("G", ["One", "Two"])).toBe("One, Two");
    expect(groupLabel("G", ["One", "Two", "Three"])).toBe("One, Two...");
  });

  it("falls back to the group id", () => {
    expect(groupLabel("GROUP_B", [])).toBe("GROUP_B");
    expect(groupLabel("GROUP_B", ["  "])).toBe("GROUP_B");
  });
});

describe("checkCoverage", () => {
  it("reports duplicates, gaps and unknown chapters in that order", () => {
    const warnings = checkCoverage([group("A", [1, 2]), group("B", [2, 5])], 4);
    expect(warnings).toEqual([
      { kind: "duplicate-chapter", chapter: 2, groupIds: ["A", "B"] },
      { kind: "missing-chapter", chapter: 3 },
      { kind: "missing-chapter", chapter: 4 },
      { kind: "unknown-chapter", chapter: 5, groupId: "B" },
    ]);
  });

  it("only checks for duplicates when the chapter count is unknown", () => {
    expect(checkCoverage([group("A", [7]), group("B", [7, 9])], 0)).toEqual([
      { kind: "duplicate-chapter", chapter: 7, groupIds: ["A", "B"] },
    ]);
  });

  it("is silent for a complete partition", () => {
    expect(checkCoverage([group("A", [1, 2]), group("B", [3])], 3)).toEqual([]);
  });
});

describe("describeCoverageWarning", () => {
  it("describes each kind", () => {
    expect(describeCoverageWarning({ kind: "duplicate-chapter", chapter: 2, groupIds: ["A", "B"] })).toBe(
      "Chapter 2 appears in more than one group (A, B)"
    );
    expect(describeCoverageWarning({ kind: "missing-chapter", chapter: 3 })).toBe(
      "Chapter 3 is not assigned to any group"
    );
    expect(describeCoverageWarning({ kind: "unknown-chapter", chapter: 5, groupId: "B" })).toBe(
      "B references chapter 5, which the book overview does not list"
    );
  });
});

describe("lookups", () => {
  it("finds groups and their task briefs", () => {
    const table = sampleTable();
    expect(findGroup(table, "STANDALONE_1")?.label).toBe("Deltas");
    expect(findGroup(table, "GROUP_Z")).toBeUndefined();
    expect(taskBrief(table, "GROUP_A")).toBe("Analyze flood risk futures.");
  });
});
