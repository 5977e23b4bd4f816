/**
 * DAP Protocol Types
 *
 * The subset of the Debug Adapter Protocol the relay needs to look at.
 * Everything it forwards untouched stays as raw text; these shapes only
 * describe what gets inspected or synthesized.
 */

// Base message types
export interface ProtocolMessage {
  seq: number;
  type: 'request' | 'response' | 'event';
}

export interface Response extends ProtocolMessage {
  type: 'response';
  request_seq: number;
  success: boolean;
  command: string;
  message?: string;
  body?: unknown;
}

export interface Event extends ProtocolMessage {
  type: 'event';
  event: string;
  body?: unknown;
}

/**
 * A decoded message whose shape has only been checked loosely: the fields the
 * relay routes on are typed, the rest is carried along as-is.
 */
export interface InspectedMessage {
  seq?: number;
  type?: string;
  command?: string;
  request_seq?: number;
  arguments?: unknown;
  [key: string]: unknown;
}

// Capabilities returned by initialize
export interface Capabilities {
  supportsConfigurationDoneRequest?: boolean;
  supportsFunctionBreakpoints?: boolean;
  supportsConditionalBreakpoints?: boolean;
  supportsHitConditionalBreakpoints?: boolean;
  supportsEvaluateForHovers?: boolean;
  supportsExceptionOptions?: boolean;
  supportsExceptionInfoRequest?: boolean;
  supportsValueFormattingOptions?: boolean;
  supportsStepBack?: boolean;
  supportsSetVariable?: boolean;
  supportsSetExpression?: boolean;
  supportsRestartFrame?: boolean;
  supportsGotoTargetsRequest?: boolean;
  supportsStepInTargetsRequest?: boolean;
  supportsCompletionsRequest?: boolean;
  supportsModulesRequest?: boolean;
  supportsLogPoints?: boolean;
  supportsDelayedStackTraceLoading?: boolean;
  supportsTerminateRequest?: boolean;
  supportsClipboardContext?: boolean;
  exceptionBreakpointFilters?: ExceptionBreakpointsFilter[];
}

export interface ExceptionBreakpointsFilter {
  filter: string;
  label: string;
  description?: string;
  default?: boolean;
  supportsCondition?: boolean;
  conditionDescription?: string;
}

export interface OutputEventBody {
  category?: 'console' | 'important' | 'stdout' | 'stderr' | 'telemetry';
  output: string;
  data?: unknown;
}

/**
 * What debugpy reports for itself. The relay has to answer `initialize` before
 * the engine is running, so it answers with the engine's capabilities.
 */
export const ENGINE_CAPABILITIES: Capabilities = {
  supportsConfigurationDoneRequest: true,
  supportsFunctionBreakpoints: true,
  supportsConditionalBreakpoints: true,
  supportsHitConditionalBreakpoints: true,
  supportsEvaluateForHovers: true,
  supportsExceptionOptions: true,
  supportsExceptionInfoRequest: true,
  supportsValueFormattingOptions: true,
  supportsStepBack: false,
  supportsSetVariable: true,
  supportsSetExpression: true,
  supportsGotoTargetsRequest: true,
  supportsStepInTargetsRequest: true,
  supportsCompletionsRequest: true,
  supportsModulesRequest: true,
  supportsLogPoints: true,
  supportsDelayedStackTraceLoading: true,
  supportsTerminateRequest: true,
  supportsClipboardContext: true,
  exceptionBreakpointFilters: [
    { filter: 'raised', label: 'Raised Exceptions', default: false },
    { filter: 'uncaught', label: 'Uncaught Exceptions', default: true },
  ],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === 'number';
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/**
 * Parse message text far enough to route it. Returns null for anything that
 * is not a JSON object or whose routing fields have the wrong types.
 */
export function inspectMessage(text: string): InspectedMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { seq, type, command, request_seq } = parsed;
  if (!isOptionalNumber(seq) || !isOptionalNumber(request_seq)) return null;
  if (!isOptionalString(type) || !isOptionalString(command)) return null;

  return { ...parsed, seq, type, command, request_seq };
}

export function createResponse(
  seq: number,
  request: { seq: number; command: string },
  success: boolean,
  extra: { body?: unknown; message?: string } = {}
): Response {
  return {
    seq,
    type: 'response',
    request_seq: request.seq,
    command: request.command,
    success,
    ...extra,
  };
}

export function createOutputEvent(seq: number, body: OutputEventBody): Event {
  return { seq, type: 'event', event: 'output', body };
}
