import env from '../config/env';
import { HttpError } from '../modules/observability-ops/http-error';

type GradioQueuedResponse = {
  event_id?: string;
};

type ServerSentEvent = {
  event: string;
  data: string;
};

type CreateClientOptions = {
  space?: string;
  apiPrefix?: string;
  token?: string | null;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export type GradioPrediction = {
  eventId: string;
  data: unknown[];
};

export type GradioClient = {
  readonly baseUrl: string;
  predict(apiName: string, data: unknown[]): Promise<GradioPrediction>;
};

const providerError = (message: string, details?: unknown) =>
  new HttpError(502, message, 'INFERENCE_PROVIDER_FAILURE', details);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * `owner/name` Space ids map to their `*.hf.space` host; full URLs pass through.
 */
export const resolveSpaceUrl = (space: string): string => {
  const trimmed = space.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  const host = trimmed.toLowerCase().replace(/[/._]/g, '-');
  return `https://${host}.hf.space`;
};

export const parseEventStream = (body: string): ServerSentEvent[] => {
  const events: ServerSentEvent[] = [];

  for (const block of body.replace(/\r\n?/g, '\n').split('\n\n')) {
    let event = 'message';
    const dataLines: string[] = [];

    for (const line of block.split('\n')) {
      if (line.startsWith('event:')) {
        event = line.slice('event:'.length).trim();
      } else if (line.startsWith('data:')) {
        dataLines.push(line.slice('data:'.length).trimStart());
      }
    }

    if (dataLines.length > 0 || event !== 'message') {
      events.push({ event, data: dataLines.join('\n') });
    }
  }

  return events;
};

const parseCompletePayload = (data: string): unknown[] => {
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (error) {
    throw providerError('Gradio returned a malformed completion payload.', { error: errorMessage(error) });
  }

  if (!Array.isArray(payload)) {
    throw providerError('Gradio returned an unexpected completion payload.', { payload });
  }

  return payload;
};

export const createGradioClient = (options: CreateClientOptions = {}): GradioClient => {
  const baseUrl = resolveSpaceUrl(options.space ?? env.GRADIO_SPACE);
  const apiPrefix = (options.apiPrefix ?? env.GRADIO_API_PREFIX).replace(/\/+$/, '');
  const token = options.token === undefined ? env.HF_TOKEN ?? null : options.token;
  const timeoutMs = options.timeoutMs ?? env.INFERENCE_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);

  if (!fetchImpl) {
    throw new Error('Fetch implementation is required for the Gradio client');
  }

  const headers = (): Record<string, string> => {
    const output: Record<string, string> = { 'Content-Type': 'application/json' };
    if (token && token.trim().length > 0) {
      output.Authorization = `Bearer ${token}`;
    }
    return output;
  };

  const send = async (url: string, init: RequestInit, signal: AbortSignal): Promise<Response> => {
    let response: Response;
    try {
      response = await fetchImpl(url, { ...init, headers: headers(), signal });
    } catch (error) {
      if (isTimeout(error)) {
        throw new HttpError(504, `Inference request timed out after ${timeoutMs}ms.`, 'INFERENCE_TIMEOUT');
      }
      throw providerError(`Inference request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      let errorDetails: unknown = null;
      try {
        errorDetails = await response.text();
      } catch {
        errorDetails = { status: response.status };
      }
      throw providerError(`Gradio request failed with status ${response.status}.`, {
        status: response.status,
        response: errorDetails
      });
    }

    return response;
  };

  return {
    baseUrl,
    async predict(apiName: string, data: unknown[]): Promise<GradioPrediction> {
      const endpoint = `${baseUrl}${apiPrefix}/call/${apiName.replace(/^\/+/, '')}`;
      const signal = AbortSignal.timeout(timeoutMs);

      const queued = await send(endpoint, { method: 'POST', body: JSON.stringify({ data }) }, signal);
      const { event_id: eventId } = (await queued.json()) as GradioQueuedResponse;
      if (!eventId || typeof eventId !== 'string') {
        throw providerError('Gradio did not return an event id.');
      }

      const stream = await send(`${endpoint}/${eventId}`, { method: 'GET' }, signal);
      let body: string;
      try {
        body = await stream.text();
      } catch (error) {
        if (isTimeout(error)) {
          throw new HttpError(504, `Inference request timed out after ${timeoutMs}ms.`, 'INFERENCE_TIMEOUT');
        }
        throw providerError(`Inference stream failed: ${errorMessage(error)}`);
      }

      const events = parseEventStream(body);
      const failure = events.find((event) => event.event === 'error');
      if (failure) {
        const detail = failure.data && failure.data !== 'null' ? failure.data : 'no detail provided';
        throw providerError(`Gradio reported an error: ${detail}`);
      }

      const complete = [...events].reverse().find((event) => event.event === 'complete');
      if (!complete) {
        throw providerError('Gradio stream ended without a completion event.', { events: events.length });
      }

      return { eventId, data: parseCompletePayload(complete.data) };
    }
  };
};
