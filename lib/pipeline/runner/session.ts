/**
 * ForesightSession
 *
 * Imperative shell around the pure state machine in ./state. It owns the
 * authoritative PipelineState, runs the effects the reducer asks for and
 * feeds their outcomes back in. The in-flight marker is set synchronously
 * by the request event, before the first await, so an overlapping call
 * sees Busy and never starts a second provider call.
 */

import { BehaviorSubject } from "rxjs";
import type {
  AIGateway,
  BookSource,
  BoundedText,
  GeneratedAppendix,
  GenerationRequest,
  PlanningTable,
  Result,
  WordCountRange,
} from "../core/types";
import { err, ok } from "../core/types";
import {
  ExtractionError,
  GatewayError,
  OrchestratorError,
  errorMessage,
  type PipelineError,
} from "../core/errors";
import {
  analyzeBook,
  extractBook,
  generateAppendix,
  requestPlanningEdit,
  validateCredential,
} from "../steps";
import { truncate } from "../truncation/truncate";
import { describeCoverageWarning, findGroup } from "../planning/planning-table";
import { renderPlanningTableMarkdown } from "../planning/planning-markdown";
import {
  exportMetadataFor,
  renderAppendix,
  type ExportFormat,
  type ExportMetadata,
  type RenderedFile,
} from "../export";
import {
  initialState,
  transition,
  type Effect,
  type PipelineEvent,
  type PipelineState,
} from "./state";
import { nullProgress, type Progress, type SessionSettings, type StepName } from "./types";

export interface ForesightSessionOptions {
  gateway: AIGateway;
  settings: SessionSettings;
  progress?: Progress;
  now?: () => Date;
}

export interface GenerateOptions {
  timeHorizon?: string;
  wordCount?: WordCountRange;
  thematicFocus?: string;
}

/** Effects that call out to extraction or the provider. */
type WorkEffect = Exclude<Effect, { type: "open-review" }>;

type DispatchResult =
  | { ok: true; state: PipelineState; effects: WorkEffect[] }
  | { ok: false; error: OrchestratorError };

const EFFECT_STEPS: Record<WorkEffect["type"], StepName> = {
  "validate-credential": "credential",
  extract: "extract",
  analyze: "analyze",
  edit: "edit",
  generate: "generate",
};

function isWork(effect: Effect): effect is WorkEffect {
  return effect.type !== "open-review";
}

export class ForesightSession {
  readonly state$: BehaviorSubject<PipelineState>;

  private readonly gateway: AIGateway;
  private readonly settings: SessionSettings;
  private readonly progress: Progress;
  private readonly now: () => Date;
  private corpusCache = new Map<number, BoundedText>();

  constructor(options: ForesightSessionOptions) {
    this.gateway = options.gateway;
    this.settings = options.settings;
    this.progress = options.progress ?? nullProgress;
    this.now = options.now ?? (() => new Date());
    this.state$ = new BehaviorSubject(initialState());
  }

  get state(): PipelineState {
    return this.state$.getValue();
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  async validateCredential(): Promise<Result<void, PipelineError>> {
    const result = await this.run({ type: "credential-requested" });
    return result.ok ? ok(undefined) : result;
  }

  /**
   * Replace whatever the session holds with a new book. Allowed at every
   * stage once the credential is validated.
   */
  async upload(fileName: string, bytes: Uint8Array): Promise<Result<BookSource, PipelineError>> {
    const result = await this.run({ type: "upload-started", fileName, bytes });
    if (!result.ok) return result;
    return result.value.type === "extraction-succeeded"
      ? ok(result.value.source)
      : err(this.unexpected(result.value));
  }

  async analyze(): Promise<Result<PlanningTable, PipelineError>> {
    const result = await this.run({ type: "analysis-requested" });
    if (!result.ok) return result;
    return result.value.type === "analysis-succeeded"
      ? ok(result.value.table)
      : err(this.unexpected(result.value));
  }

  /**
   * Apply a change request. The current table is replaced only on success.
   */
  async requestEdit(instruction: string): Promise<Result<PlanningTable, PipelineError>> {
    const result = await this.run({ type: "edit-requested", instruction });
    if (!result.ok) return result;
    return result.value.type === "edit-succeeded"
      ? ok(result.value.table)
      : err(this.unexpected(result.value));
  }

  /** Go back to the planning table after generating. */
  openReview(): Result<void, OrchestratorError> {
    const result = this.dispatch({ type: "review-opened" });
    return result.ok ? ok(undefined) : result;
  }

  async generate(groupId: string, options: GenerateOptions = {}): Promise<Result<GeneratedAppendix, PipelineError>> {
    const request: GenerationRequest = {
      groupId,
      timeHorizon: options.timeHorizon ?? this.settings.generation.timeHorizon,
      wordCount: options.wordCount ?? this.settings.generation.wordCount,
      thematicFocus: options.thematicFocus,
    };
    const result = await this.run({ type: "generation-requested", request });
    if (!result.ok) return result;
    return result.value.type === "generation-succeeded"
      ? ok(result.value.appendix)
      : err(this.unexpected(result.value));
  }

  /**
   * Render a generated appendix. Export does not change the stage.
   */
  async export(
    groupId: string,
    format: ExportFormat,
    metadata?: Partial<ExportMetadata>
  ): Promise<Result<RenderedFile, PipelineError>> {
    const { table, appendices, source } = this.state;
    if (table && !findGroup(table, groupId) && !(groupId in appendices)) {
      return err(new OrchestratorError("UnknownGroup", `No chapter group "${groupId}" in the planning table`));
    }
    const appendix = appendices[groupId];
    if (!appendix) {
      return err(
        new OrchestratorError("InvalidTransition", `No appendix has been generated for ${groupId}`, { groupId })
      );
    }

    const defaults = exportMetadataFor(
      appendix,
      source?.pdfInfo.title || source?.fileName || "Uploaded book",
      this.settings.attribution
    );
    const merged: ExportMetadata = {
      title: metadata?.title ?? defaults.title,
      timestamp: metadata?.timestamp ?? defaults.timestamp,
      sourceLabel: metadata?.sourceLabel ?? defaults.sourceLabel,
      attribution: metadata?.attribution ?? defaults.attribution,
    };
    this.progress.emit({ type: "step-start", step: "export", groupId });
    const rendered = await renderAppendix(appendix, format, merged);
    if (rendered.ok) {
      this.progress.emit({ type: "step-complete", step: "export", groupId });
    } else {
      this.reportError("export", rendered.error);
    }
    return rendered;
  }

  planningTableMarkdown(): Result<string, OrchestratorError> {
    const { table } = this.state;
    if (!table) {
      return err(new OrchestratorError("InvalidTransition", "There is no planning table yet"));
    }
    return ok(renderPlanningTableMarkdown(table));
  }

  /**
   * Bounded text for a given budget. Memoized per budget until the next
   * upload.
   */
  corpusFor(maxChars: number): BoundedText | null {
    const { source } = this.state;
    if (!source) return null;
    const cached = this.corpusCache.get(maxChars);
    if (cached) return cached;
    const { headFraction, tailFraction } = this.settings.truncation;
    const corpus = truncate(source.pages, maxChars, { headFraction, tailFraction });
    this.corpusCache.set(maxChars, corpus);
    return corpus;
  }

  // --------------------------------------------------------------------------
  // Event loop
  // --------------------------------------------------------------------------

  /**
   * Apply an event and publish the resulting state once. Analyzed is
   * transient: the review it opens is settled in the same update, so no
   * subscriber ever observes it.
   */
  private dispatch(event: PipelineEvent): DispatchResult {
    const result = transition(this.state, event);
    if (!result.ok) return result;

    let { state } = result;
    const effects: WorkEffect[] = [];
    for (const effect of result.effects) {
      if (isWork(effect)) {
        effects.push(effect);
        continue;
      }
      const opened = transition(state, { type: "review-opened" });
      if (!opened.ok) return opened;
      state = opened.state;
      effects.push(...opened.effects.filter(isWork));
    }

    this.state$.next(state);
    return { ok: true, state, effects };
  }

  /**
   * Dispatch a request, run the effects it produces and dispatch their
   * outcomes. Resolves with the first outcome, or its error.
   */
  private async run(request: PipelineEvent): Promise<Result<PipelineEvent, PipelineError>> {
    const requested = this.dispatch(request);
    if (!requested.ok) return requested;

    const queue = [...requested.effects];
    let first: PipelineEvent | undefined;

    for (let effect = queue.shift(); effect; effect = queue.shift()) {
      const outcome = await this.perform(effect);
      const applied = this.dispatch(outcome);
      if (!applied.ok) return applied;
      first ??= outcome;
      if ("error" in outcome) return err(outcome.error);
      queue.push(...applied.effects);
    }

    return first ? ok(first) : ok(request);
  }

  private async perform(effect: WorkEffect): Promise<PipelineEvent> {
    const step = EFFECT_STEPS[effect.type];
    try {
      return await this.performStep(effect, step);
    } catch (e) {
      // Unexpected failures still have to clear the in-flight marker.
      return this.failureFor(effect, e);
    }
  }

  private async performStep(effect: WorkEffect, step: StepName): Promise<PipelineEvent> {
    const { settings } = this;

    switch (effect.type) {
      case "validate-credential": {
        this.progress.emit({ type: "step-start", step });
        const result = await validateCredential({
          gateway: this.gateway,
          promptName: settings.prompts.probe,
          maxOutputTokens: settings.maxOutputTokens.probe,
          timeoutMs: settings.timeoutsMs.probe,
        });
        if (!result.ok) return this.failed({ type: "credential-failed", error: result.error }, step);
        this.progress.emit({ type: "step-complete", step });
        return { type: "credential-validated" };
      }

      case "extract": {
        this.corpusCache = new Map();
        this.progress.emit({ type: "step-start", step });
        const result = await extractBook(
          { fileName: effect.fileName, bytes: effect.bytes, limits: settings.extraction },
          ({ page, totalPages }) =>
            this.progress.emit({ type: "step-progress", step, message: "Reading pages", page, totalPages })
        );
        if (!result.ok) return this.failed({ type: "extraction-failed", error: result.error }, step);

        const source = result.value;
        for (const message of source.warnings) this.progress.emit({ type: "warning", step, message });
        const { maxChars, headFraction, tailFraction } = settings.truncation;
        const corpus = truncate(source.pages, maxChars, { headFraction, tailFraction });
        this.corpusCache.set(maxChars, corpus);
        if (corpus.truncated) {
          this.progress.emit({
            type: "warning",
            step,
            message: `Book text is ${corpus.originalChars} characters; ${corpus.omittedChars} characters from the middle are left out`,
          });
        }
        this.progress.emit({ type: "step-complete", step });
        return { type: "extraction-succeeded", source, corpus };
      }

      case "analyze": {
        this.progress.emit({ type: "step-start", step });
        const result = await analyzeBook({
          corpus: effect.corpus,
          gateway: this.gateway,
          promptName: settings.prompts.analysis,
          maxOutputTokens: settings.maxOutputTokens.analysis,
          timeoutMs: settings.timeoutsMs.analysis,
          timeHorizon: settings.generation.timeHorizon,
          wordCount: settings.generation.wordCount,
        });
        if (!result.ok) return this.failed({ type: "analysis-failed", error: result.error }, step);
        this.reportCoverage(result.value.table, step);
        this.progress.emit({ type: "step-complete", step });
        return { type: "analysis-succeeded", table: result.value.table };
      }

      case "edit": {
        this.progress.emit({ type: "step-start", step });
        const result = await requestPlanningEdit({
          table: effect.table,
          instruction: effect.instruction,
          gateway: this.gateway,
          promptName: settings.prompts.edit,
          maxOutputTokens: settings.maxOutputTokens.analysis,
          timeoutMs: settings.timeoutsMs.analysis,
        });
        if (!result.ok) return this.failed({ type: "edit-failed", error: result.error }, step);
        this.reportCoverage(result.value.table, step);
        this.progress.emit({ type: "step-complete", step });
        return { type: "edit-succeeded", table: result.value.table };
      }

      case "generate": {
        const { groupId } = effect.request;
        const group = findGroup(effect.table, groupId);
        if (!group) {
          return this.failed(
            {
              type: "generation-failed",
              error: new GatewayError("InvalidRequest", `No chapter group "${groupId}" in the planning table`),
            },
            step
          );
        }
        this.progress.emit({ type: "step-start", step, groupId });
        const result = await generateAppendix({
          table: effect.table,
          group,
          request: effect.request,
          corpus: effect.corpus,
          previousGenerations: effect.previousGenerations,
          gateway: this.gateway,
          promptName: settings.prompts.generation,
          maxOutputTokens: settings.maxOutputTokens.generation,
          timeoutMs: settings.timeoutsMs.generation,
          now: this.now,
        });
        if (!result.ok) return this.failed({ type: "generation-failed", error: result.error }, step);
        if (result.value.truncated) {
          this.progress.emit({
            type: "warning",
            step,
            message: `${groupId}: the appendix stopped at the output token limit and may be incomplete`,
          });
        }
        this.progress.emit({ type: "step-complete", step, groupId });
        return { type: "generation-succeeded", appendix: result.value };
      }
    }
  }

  private failureFor(effect: WorkEffect, cause: unknown): PipelineEvent {
    const step = EFFECT_STEPS[effect.type];
    const message = `Unexpected failure: ${errorMessage(cause)}`;
    switch (effect.type) {
      case "extract":
        return this.failed(
          { type: "extraction-failed", error: new ExtractionError("Corrupted", message, undefined, cause) },
          step
        );
      case "validate-credential":
        return this.failed({ type: "credential-failed", error: this.unexpectedGatewayError(message, cause) }, step);
      case "analyze":
        return this.failed({ type: "analysis-failed", error: this.unexpectedGatewayError(message, cause) }, step);
      case "edit":
        return this.failed({ type: "edit-failed", error: this.unexpectedGatewayError(message, cause) }, step);
      case "generate":
        return this.failed({ type: "generation-failed", error: this.unexpectedGatewayError(message, cause) }, step);
    }
  }

  private unexpectedGatewayError(message: string, cause: unknown): GatewayError {
    return new GatewayError("InvalidRequest", message, { details: { unexpected: true }, cause });
  }

  private failed<E extends PipelineEvent & { error: PipelineError }>(event: E, step: StepName): E {
    this.reportError(step, event.error);
    return event;
  }

  private reportError(step: StepName, error: PipelineError): void {
    this.progress.emit({
      type: "step-error",
      step,
      kind: error.kind,
      error: error.message,
      remediation: error.remediation,
    });
  }

  private reportCoverage(table: PlanningTable, step: StepName): void {
    for (const warning of table.warnings) {
      this.progress.emit({ type: "warning", step, message: describeCoverageWarning(warning) });
    }
  }

  private unexpected(event: PipelineEvent): OrchestratorError {
    return new OrchestratorError("InvalidTransition", `Unexpected outcome "${event.type}"`, { event: event.type });
  }
}
