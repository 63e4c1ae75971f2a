import { DocumentFault, suggestionFor, toFault } from './errors';
import type { ErrorCode, FaultKind } from './errors';

export type EnvelopeData = Record<string, unknown>;

export interface EnvelopeError {
  code: ErrorCode;
  type: FaultKind;
  details: string;
  suggestion: string;
}

export type Envelope =
  | { success: true; message: string; data: EnvelopeData }
  | { success: false; message: string; data: EnvelopeData; error: EnvelopeError };

/** What a handler produced, before it is translated into an envelope. */
export type Outcome<T extends EnvelopeData = EnvelopeData> =
  | { ok: true; message: string; data: T }
  | { ok: false; fault: DocumentFault };

export function ok<T extends EnvelopeData>(message: string, data: T): Outcome<T> {
  return { ok: true, message, data };
}

export function failed(fault: DocumentFault): Outcome<never> {
  return { ok: false, fault };
}

/** Run a handler body and turn anything it throws into a failed outcome. */
export async function attempt<T extends EnvelopeData>(body: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
  try {
    return await body();
  } catch (err) {
    return failed(toFault(err));
  }
}

export function successEnvelope(message: string, data: EnvelopeData): Envelope {
  return { success: true, message, data };
}

export function errorEnvelope(code: ErrorCode, fault: DocumentFault): Envelope {
  return {
    success: false,
    message: fault.message,
    data: {},
    error: {
      code,
      type: fault.kind,
      details: fault.message,
      suggestion: suggestionFor(code),
    },
  };
}

export function toEnvelope(code: ErrorCode, outcome: Outcome): Envelope {
  return outcome.ok ? successEnvelope(outcome.message, outcome.data) : errorEnvelope(code, outcome.fault);
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function toToolResult(envelope: Envelope): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: JSON.stringify(envelope, null, 2) }] };
  if (!envelope.success) result.isError = true;
  return result;
}
