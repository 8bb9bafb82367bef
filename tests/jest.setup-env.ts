process.env.NODE_ENV = 'test';
process.env.INFERENCE_PROVIDER = 'gradio';
process.env.GRADIO_SPACE = 'test-owner/test-space';
process.env.CORS_ORIGIN = 'http://localhost:5173';
delete process.env.HF_TOKEN;
delete process.env.OPENROUTER_API_KEY;
delete process.env.OPENROUTER_BASE_URL;
delete process.env.GCP_PROJECT_ID;
delete process.env.ANALYZE_RATE_LIMIT_MAX;
delete process.env.GRADIO_API_NAME;
delete process.env.GRADIO_API_PREFIX;
delete process.env.INFERENCE_TIMEOUT_MS;
