import {
  describeLayout,
  describeReason,
  type PinExplanation,
  type PinMatch,
} from "@mpin-check/policy";

import type { OutputFormat } from "./env";

export interface RenderOptions {
  format: OutputFormat;
  explain: boolean;
}

function renderMatch(match: PinMatch): string {
  if (match.reason === "COMMONLY_USED") {
    return `  - ${match.reason}: common PIN list`;
  }
  return `  - ${match.reason}: ${match.role} as ${describeLayout(match.layout)}`;
}

function renderText(explanation: PinExplanation, explain: boolean): string {
  const { result, matches } = explanation;
  const lines = [`Strength: ${result.strength}`];

  if (result.reasons.length === 0) {
    lines.push("No weaknesses found.");
  } else {
    lines.push("Reasons:");
    for (const reason of result.reasons) {
      lines.push(`  - ${reason}: ${describeReason(reason)}`);
    }
  }

  if (explain && matches.length > 0) {
    lines.push("Matches:");
    lines.push(...matches.map(renderMatch));
  }

  return `${lines.join("\n")}\n`;
}

function renderJson(explanation: PinExplanation, explain: boolean): string {
  const { result, matches } = explanation;
  const payload = explain
    ? { strength: result.strength, reasons: result.reasons, matches }
    : { strength: result.strength, reasons: result.reasons };
  return `${JSON.stringify(payload)}\n`;
}

export function renderExplanation(
  explanation: PinExplanation,
  options: RenderOptions,
): string {
  return options.format === "json"
    ? renderJson(explanation, options.explain)
    : renderText(explanation, options.explain);
}
