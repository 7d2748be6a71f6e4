/**
 * FILE PURPOSE: Apply a guardrail decision to a candidate response
 *
 * HOW: block → fixed fallback that asks for the model number and never
 *      includes any of the blocked text. warn → advisory appended, content
 *      untouched. allow / log → unchanged. Metadata is attached in every case
 *      so "passed evaluation" is distinguishable from "never evaluated".
 */

import type { Decision, MitigationMetadata, MitigationResult } from './types.js';

export const BLOCKED_RESPONSE_FALLBACK =
  'I want to make sure I provide you with accurate information. ' +
  'Let me search our database more carefully for your specific request. ' +
  "Could you please provide your appliance's model number so I can give you " +
  'the most precise part recommendations and installation guidance?';

export const WARNING_SUFFIX =
  '\n\n⚠️ Please verify this information with your appliance manual ' +
  'or contact our support team if you need additional confirmation.';

export function applyMitigation(
  responseText: string,
  decision: Decision,
  _originalQuery: string,
): MitigationResult {
  const base = {
    evaluated: true as const,
    action: decision.action,
    confidence: decision.confidence,
  };

  switch (decision.action) {
    case 'block':
      return {
        finalText: BLOCKED_RESPONSE_FALLBACK,
        metadata: { ...base, reasons: decision.reasons },
      };
    case 'warn':
      return {
        finalText: responseText + WARNING_SUFFIX,
        metadata: { ...base, reasons: decision.reasons },
      };
    case 'allow':
    case 'log': {
      const metadata: MitigationMetadata = base;
      return { finalText: responseText, metadata };
    }
  }
}
