/**
 * Best-effort server-side inference duration, in seconds.
 *
 * Timing headers win over body fields. Values above 10 are assumed to be
 * milliseconds. Returns undefined when the response carries no timing signal.
 */

export const TIMING_HEADERS = ['x-inference-time', 'x-process-time', 'x-runtime-ms', 'x-duration-ms'] as const;
export const TIMING_BODY_KEYS = ['inference_time', 'inferenceSeconds', 'duration', 'elapsed', 'time', 'runtime'] as const;

const MILLISECONDS_THRESHOLD = 10;

function toSeconds(value: number): number {
  return value > MILLISECONDS_THRESHOLD ? value / 1000 : value;
}

function parseNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function fromHeaders(headers: Readonly<Record<string, string | undefined>>): number | undefined {
  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) lowered.set(name.toLowerCase(), value);
  }

  for (const name of TIMING_HEADERS) {
    const value = parseNumeric(lowered.get(name));
    if (value !== undefined) return value;
  }
  return undefined;
}

function searchBody(node: unknown): number | undefined {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = searchBody(item);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  if (typeof node !== 'object' || node === null) {
    return undefined;
  }

  const obj: Record<string, unknown> = { ...node };
  for (const key of TIMING_BODY_KEYS) {
    if (!(key in obj)) continue;
    const value = parseNumeric(obj[key]);
    if (value !== undefined) return value;
  }
  for (const child of Object.values(obj)) {
    const found = searchBody(child);
    if (found !== undefined) return found;
  }
  return undefined;
}

export function estimateInferenceSeconds(
  headers: Readonly<Record<string, string | undefined>>,
  body?: unknown
): number | undefined {
  const fromHeader = fromHeaders(headers);
  if (fromHeader !== undefined) {
    return toSeconds(fromHeader);
  }

  const fromBody = searchBody(body);
  return fromBody === undefined ? undefined : toSeconds(fromBody);
}

/** Round-trip time not spent inferring; the whole latency when inference time is unknown. */
export function networkSeconds(latencySeconds: number, inferenceSeconds?: number): number {
  if (inferenceSeconds === undefined) return latencySeconds;
  return Math.max(latencySeconds - inferenceSeconds, 0);
}
