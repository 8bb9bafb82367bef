import { HttpError } from '../modules/observability-ops/http-error';
import { createGradioClient, parseEventStream, resolveSpaceUrl } from '../lib/gradio';

describe('GradioClient', () => {
  const createJsonResponse = (status: number, body: unknown) => ({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body)
  });

  const createStreamResponse = (body: string) => ({
    ok: true,
    status: 200,
    json: async () => {
      throw new Error('not json');
    },
    text: async () => body
  });

  afterEach(() => {
    jest.resetAllMocks();
  });

  it('resolves Hugging Face Space ids to their hf.space host', () => {
    expect(resolveSpaceUrl('Muhammadidrees/MoizMedgemma27b')).toBe('https://muhammadidrees-moizmedgemma27b.hf.space');
    expect(resolveSpaceUrl('owner/model.v2')).toBe('https://owner-model-v2.hf.space');
    expect(resolveSpaceUrl('http://localhost:7860/')).toBe('http://localhost:7860');
  });

  it('splits an event stream into named events', () => {
    const events = parseEventStream('event: generating\ndata: ["partial"]\n\nevent: complete\ndata: ["done"]\n\n');

    expect(events).toEqual([
      { event: 'generating', data: '["partial"]' },
      { event: 'complete', data: '["done"]' }
    ]);
  });

  it('queues a prediction and returns the completed payload', async () => {
    const fetchImpl = jest
      .fn()
      .mockResolvedValueOnce(createJsonResponse(200, { event_id: 'evt-1' }))
      .mockResolvedValueOnce(createStreamResponse('event: complete\ndata: ["# Report"]\n\n'));
    const client = createGradioClient({
      space: 'owner/space',
      apiPrefix: '/gradio_api',
      token: 'test-token',
      timeoutMs: 1000,
      fetchImpl
    });

    const prediction = await client.predict('/respond', [4.5, 'Male']);

    expect(prediction).toEqual({ eventId: 'evt-1', data: ['# Report'] });
    expect(fetchImpl).toHaveBeenNthCalledWith(
      1,
      'https://owner-space.hf.space/gradio_api/call/respond',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ data: [4.5, 'Male'] }),
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' })
      })
    );
    expect(fetchImpl).toHaveBeenNthCalledWith(
      2,
      'https://owner-space.hf.space/gradio_api/call/respond/evt-1',
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('omits the authorization header without a token', async () => {
    const fetchImpl = jest
      .fn()
      .mockResolvedValueOnce(createJsonResponse(200, { event_id: 'evt-2' }))
      .mockResolvedValueOnce(createStreamResponse('event: complete\ndata: ["ok"]\n\n'));
    const client = createGradioClient({ space: 'owner/space', token: null, fetchImpl });

    await client.predict('respond', []);

    const [, init] = fetchImpl.mock.calls[0];
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('surfaces a Gradio error event as a provider failure', async () => {
    const fetchImpl = jest
      .fn()
      .mockResolvedValueOnce(createJsonResponse(200, { event_id: 'evt-3' }))
      .mockResolvedValueOnce(createStreamResponse('event: error\ndata: "GPU quota exceeded"\n\n'));
    const client = createGradioClient({ space: 'owner/space', token: null, fetchImpl });

    await expect(client.predict('respond', [])).rejects.toMatchObject({
      status: 502,
      code: 'INFERENCE_PROVIDER_FAILURE',
      message: 'Gradio reported an error: "GPU quota exceeded"'
    } satisfies Partial<HttpError>);
  });

  it('rejects non-2xx responses without retrying', async () => {
    const fetchImpl = jest.fn().mockResolvedValue(createJsonResponse(503, { error: 'sleeping' }));
    const client = createGradioClient({ space: 'owner/space', token: null, fetchImpl });

    await expect(client.predict('respond', [])).rejects.toMatchObject({
      status: 502,
      code: 'INFERENCE_PROVIDER_FAILURE',
      message: 'Gradio request failed with status 503.'
    } satisfies Partial<HttpError>);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('maps an aborted request to a timeout error', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchImpl = jest.fn().mockRejectedValue(timeout);
    const client = createGradioClient({ space: 'owner/space', token: null, timeoutMs: 250, fetchImpl });

    await expect(client.predict('respond', [])).rejects.toMatchObject({
      status: 504,
      code: 'INFERENCE_TIMEOUT',
      message: 'Inference request timed out after 250ms.'
    } satisfies Partial<HttpError>);
  });

  it('wraps network failures with the underlying message', async () => {
    const fetchImpl = jest.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND owner-space.hf.space'));
    const client = createGradioClient({ space: 'owner/space', token: null, fetchImpl });

    await expect(client.predict('respond', [])).rejects.toMatchObject({
      status: 502,
      message: 'Inference request failed: getaddrinfo ENOTFOUND owner-space.hf.space'
    } satisfies Partial<HttpError>);
  });

  it('fails when the stream never completes', async () => {
    const fetchImpl = jest
      .fn()
      .mockResolvedValueOnce(createJsonResponse(200, { event_id: 'evt-4' }))
      .mockResolvedValueOnce(createStreamResponse('event: heartbeat\ndata: null\n\n'));
    const client = createGradioClient({ space: 'owner/space', token: null, fetchImpl });

    await expect(client.predict('respond', [])).rejects.toMatchObject({
      status: 502,
      message: 'Gradio stream ended without a completion event.'
    } satisfies Partial<HttpError>);
  });
});
