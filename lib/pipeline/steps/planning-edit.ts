/**
 * Planning Edit Step
 *
 * Applies a free-text change request to the planning table. The input
 * table is never modified; success yields a new table.
 */

import type { AIGateway, PlanningTable, Result } from "../core/types";
import { err, ok } from "../core/types";
import { GatewayError } from "../core/errors";
import { planningTableWireSchema } from "../core/schemas";
import { loadPrompt } from "../core/llm";
import { planningTableFromWire, planningTableToWire } from "../planning/planning-table";
import type { PlanningOutput } from "./analysis";

export interface RequestPlanningEditInput {
  table: PlanningTable;
  instruction: string;
  gateway: AIGateway;
  promptName: string;
  maxOutputTokens: number;
  timeoutMs: number;
}

export async function requestPlanningEdit(
  input: RequestPlanningEditInput
): Promise<Result<PlanningOutput, GatewayError>> {
  const { table, gateway, promptName } = input;
  const instruction = input.instruction.trim();

  if (!instruction) {
    return err(
      new GatewayError("InvalidRequest", "The change request is empty", {
        remediation: "Describe the change to make, e.g. 'Combine chapters 4 and 5 into one group'.",
      })
    );
  }

  const prompt = await loadPrompt(promptName, {
    planning_table_json: JSON.stringify(planningTableToWire(table), null, 2),
    instruction,
  });

  const result = await gateway.generateStructured(prompt, planningTableWireSchema, {
    maxOutputTokens: input.maxOutputTokens,
    timeoutMs: input.timeoutMs,
    log: { taskType: "edit", promptName },
  });
  if (!result.ok) return result;

  return ok({
    table: planningTableFromWire(result.value.value),
    modelId: result.value.modelId,
    usage: result.value.usage,
  });
}
