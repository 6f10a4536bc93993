import { CapabilityError } from './types.js';
import type { CapabilityName, CapabilityErrorKind } from './types.js';

export function classifyStatus(status: number): CapabilityErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'network';
  return 'bad_response';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * fetch() that turns every failure into a classified CapabilityError.
 * `label` names the provider in messages, e.g. "OpenAI".
 */
export async function capabilityFetch(
  capability: CapabilityName,
  label: string,
  url: string,
  init: RequestInit
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    if (isAbortError(error)) {
      throw new CapabilityError(`${label} request aborted`, capability, 'timeout', { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new CapabilityError(`${label} unreachable: ${reason}`, capability, 'network', { cause: error });
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response);
    throw new CapabilityError(
      `${label} error (${response.status}): ${detail}`,
      capability,
      classifyStatus(response.status),
      { status: response.status }
    );
  }

  return response;
}

export async function readJson<T>(
  response: Response,
  capability: CapabilityName,
  label: string
): Promise<T> {
  try {
    return await response.json() as T;
  } catch (error) {
    throw new CapabilityError(`${label} returned an unreadable body`, capability, 'bad_response', { cause: error });
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return response.statusText;
  }

  return jsonErrorMessage(text) ?? (text.trim() || response.statusText);
}

function jsonErrorMessage(text: string): string | undefined {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return undefined;
  }

  if (typeof body !== 'object' || body === null || !('error' in body)) return undefined;
  const error = body.error;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}
