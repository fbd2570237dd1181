/**
 * Pipeline state machine.
 *
 * `transition` is a pure reducer: it never performs I/O. Requests that need
 * a provider or extraction call return effects for the session to run,
 * and the session feeds the outcome back in as another event.
 */

import type {
  BookSource,
  BoundedText,
  GeneratedAppendix,
  GenerationRequest,
  PlanningTable,
} from "../core/types";
import {
  OrchestratorError,
  type ExtractionError,
  type GatewayError,
  type PipelineError,
} from "../core/errors";
import { findGroup } from "../planning/planning-table";

// ============================================================================
// State
// ============================================================================

export type Stage =
  | { name: "AwaitingCredential" }
  | { name: "AwaitingUpload" }
  | { name: "Extracted" }
  | { name: "Analyzed" }
  | { name: "Reviewing" }
  | { name: "Generating"; groupId: string }
  | { name: "Generated"; groupId: string };

export type StageName = Stage["name"];

export type ExtractionStatus =
  | { status: "pending" }
  | { status: "extracted" }
  | { status: "failed"; error: ExtractionError };

export type Operation = "credential" | "extract" | "analyze" | "edit" | "generate";

export interface InFlight {
  operation: Operation;
  groupId?: string;
}

export interface CompletedSteps {
  credential: boolean;
  extract: boolean;
  analyze: boolean;
  review: boolean;
  generate: boolean;
}

export interface PipelineState {
  stage: Stage;
  source: BookSource | null;
  extraction: ExtractionStatus;
  corpus: BoundedText | null;
  table: PlanningTable | null;
  appendices: Readonly<Record<string, GeneratedAppendix>>;
  /** Times each group's appendix has been regenerated */
  regenerations: Readonly<Record<string, number>>;
  completed: CompletedSteps;
  inFlight: InFlight | null;
  lastError: PipelineError | null;
}

export function initialState(): PipelineState {
  return {
    stage: { name: "AwaitingCredential" },
    source: null,
    extraction: { status: "pending" },
    corpus: null,
    table: null,
    appendices: {},
    regenerations: {},
    completed: { credential: false, extract: false, analyze: false, review: false, generate: false },
    inFlight: null,
    lastError: null,
  };
}

export function stageLabel(stage: Stage): string {
  return stage.name === "Generating" || stage.name === "Generated"
    ? `${stage.name}{${stage.groupId}}`
    : stage.name;
}

// ============================================================================
// Events and effects
// ============================================================================

export type PipelineEvent =
  | { type: "credential-requested" }
  | { type: "credential-validated" }
  | { type: "credential-failed"; error: GatewayError }
  | { type: "upload-started"; fileName: string; bytes: Uint8Array }
  | { type: "extraction-succeeded"; source: BookSource; corpus: BoundedText }
  | { type: "extraction-failed"; error: ExtractionError }
  | { type: "analysis-requested" }
  | { type: "analysis-succeeded"; table: PlanningTable }
  | { type: "analysis-failed"; error: GatewayError }
  | { type: "review-opened" }
  | { type: "edit-requested"; instruction: string }
  | { type: "edit-succeeded"; table: PlanningTable }
  | { type: "edit-failed"; error: GatewayError }
  | { type: "generation-requested"; request: GenerationRequest }
  | { type: "generation-succeeded"; appendix: GeneratedAppendix }
  | { type: "generation-failed"; error: GatewayError };

export type Effect =
  | { type: "validate-credential" }
  | { type: "extract"; fileName: string; bytes: Uint8Array }
  | { type: "analyze"; corpus: BoundedText }
  | { type: "edit"; table: PlanningTable; instruction: string }
  | { type: "generate"; table: PlanningTable; corpus: BoundedText; request: GenerationRequest; previousGenerations: number }
  | { type: "open-review" };

export type TransitionResult =
  | { ok: true; state: PipelineState; effects: Effect[] }
  | { ok: false; error: OrchestratorError };

const REQUESTS = new Set<PipelineEvent["type"]>([
  "credential-requested",
  "upload-started",
  "analysis-requested",
  "review-opened",
  "edit-requested",
  "generation-requested",
]);

function moved(state: PipelineState, effects: Effect[] = []): TransitionResult {
  return { ok: true, state, effects };
}

function invalid(state: PipelineState, event: PipelineEvent): TransitionResult {
  return {
    ok: false,
    error: new OrchestratorError(
      "InvalidTransition",
      `"${event.type}" is not allowed at stage ${stageLabel(state.stage)}`,
      { event: event.type, stage: stageLabel(state.stage) }
    ),
  };
}

function settles(state: PipelineState, operation: Operation): boolean {
  return state.inFlight?.operation === operation;
}

// ============================================================================
// Reducer
// ============================================================================

export function transition(state: PipelineState, event: PipelineEvent): TransitionResult {
  if (state.inFlight && REQUESTS.has(event.type)) {
    return {
      ok: false,
      error: new OrchestratorError(
        "Busy",
        `Cannot start "${event.type}" while ${state.inFlight.operation} is running`,
        { event: event.type, inFlight: state.inFlight.operation }
      ),
    };
  }

  const stage = state.stage.name;

  switch (event.type) {
    case "credential-requested":
      if (stage !== "AwaitingCredential") return invalid(state, event);
      return moved({ ...state, inFlight: { operation: "credential" }, lastError: null }, [
        { type: "validate-credential" },
      ]);

    case "credential-validated":
      if (stage !== "AwaitingCredential") return invalid(state, event);
      return moved({
        ...state,
        stage: { name: "AwaitingUpload" },
        completed: { ...state.completed, credential: true },
        inFlight: null,
        lastError: null,
      });

    case "credential-failed":
      if (!settles(state, "credential")) return invalid(state, event);
      return moved({ ...state, inFlight: null, lastError: event.error });

    case "upload-started":
      if (stage === "AwaitingCredential") return invalid(state, event);
      return moved(
        {
          ...initialState(),
          stage: { name: "AwaitingUpload" },
          completed: { ...initialState().completed, credential: true },
          inFlight: { operation: "extract" },
        },
        [{ type: "extract", fileName: event.fileName, bytes: event.bytes }]
      );

    case "extraction-succeeded":
      if (stage !== "AwaitingUpload" || !settles(state, "extract")) return invalid(state, event);
      return moved({
        ...state,
        stage: { name: "Extracted" },
        source: event.source,
        corpus: event.corpus,
        extraction: { status: "extracted" },
        completed: { ...state.completed, extract: true },
        inFlight: null,
      });

    case "extraction-failed":
      if (!settles(state, "extract")) return invalid(state, event);
      return moved({
        ...state,
        stage: { name: "AwaitingUpload" },
        extraction: { status: "failed", error: event.error },
        inFlight: null,
        lastError: event.error,
      });

    case "analysis-requested":
      if (stage !== "Extracted" || !state.corpus) return invalid(state, event);
      return moved({ ...state, inFlight: { operation: "analyze" }, lastError: null }, [
        { type: "analyze", corpus: state.corpus },
      ]);

    case "analysis-succeeded":
      if (stage !== "Extracted" || !settles(state, "analyze")) return invalid(state, event);
      return moved(
        {
          ...state,
          stage: { name: "Analyzed" },
          table: event.table,
          completed: { ...state.completed, analyze: true },
          inFlight: null,
        },
        [{ type: "open-review" }]
      );

    case "analysis-failed":
      if (!settles(state, "analyze")) return invalid(state, event);
      return moved({ ...state, stage: { name: "Extracted" }, inFlight: null, lastError: event.error });

    case "review-opened":
      if (stage !== "Analyzed" && stage !== "Generated") return invalid(state, event);
      return moved({
        ...state,
        stage: { name: "Reviewing" },
        completed: { ...state.completed, review: true },
      });

    case "edit-requested":
      if (stage !== "Reviewing" || !state.table) return invalid(state, event);
      return moved({ ...state, inFlight: { operation: "edit" }, lastError: null }, [
        { type: "edit", table: state.table, instruction: event.instruction },
      ]);

    case "edit-succeeded":
      if (stage !== "Reviewing" || !settles(state, "edit")) return invalid(state, event);
      return moved({ ...state, table: event.table, inFlight: null });

    case "edit-failed":
      if (!settles(state, "edit")) return invalid(state, event);
      return moved({ ...state, inFlight: null, lastError: event.error });

    case "generation-requested": {
      if ((stage !== "Reviewing" && stage !== "Generated") || !state.table || !state.corpus) {
        return invalid(state, event);
      }
      const { groupId } = event.request;
      if (!findGroup(state.table, groupId)) {
        return {
          ok: false,
          error: new OrchestratorError("UnknownGroup", `No chapter group "${groupId}" in the planning table`, {
            groupId,
            known: state.table.groups.map((g) => g.groupId),
          }),
        };
      }
      const previousGenerations =
        groupId in state.appendices ? (state.regenerations[groupId] ?? 0) + 1 : 0;
      return moved(
        {
          ...state,
          stage: { name: "Generating", groupId },
          inFlight: { operation: "generate", groupId },
          lastError: null,
        },
        [
          {
            type: "generate",
            table: state.table,
            corpus: state.corpus,
            request: event.request,
            previousGenerations,
          },
        ]
      );
    }

    case "generation-succeeded": {
      if (state.stage.name !== "Generating" || !settles(state, "generate")) return invalid(state, event);
      const groupId = state.stage.groupId;
      if (event.appendix.groupId !== groupId) return invalid(state, event);
      const { status } = event.appendix;
      return moved({
        ...state,
        stage: { name: "Generated", groupId },
        appendices: { ...state.appendices, [groupId]: event.appendix },
        regenerations: {
          ...state.regenerations,
          [groupId]: status.kind === "regenerated" ? status.count : 0,
        },
        completed: { ...state.completed, generate: true },
        inFlight: null,
      });
    }

    case "generation-failed":
      if (!settles(state, "generate")) return invalid(state, event);
      return moved({ ...state, stage: { name: "Reviewing" }, inFlight: null, lastError: event.error });
  }
}
