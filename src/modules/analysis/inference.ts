import env from '../../config/env';
import { createGradioClient, type GradioClient } from '../../lib/gradio';
import { createOpenRouterClient, type OpenRouterChatClient } from '../../lib/openrouter';
import { HttpError } from '../observability-ops/http-error';
import { REPORT_HEADINGS } from './report-extractor';
import { LAB_FIELDS, PANEL_FIELDS, PANEL_UNITS, type BiomarkerPanel } from './types';

export type InferenceProvider = 'gradio' | 'openrouter';

export type ReportInferenceClient = {
  readonly provider: InferenceProvider;
  generateReport(panel: BiomarkerPanel): Promise<string>;
};

export const panelToGradioData = (panel: BiomarkerPanel): Array<number | string> =>
  PANEL_FIELDS.map((field) => panel[field]);

export const createGradioInference = (
  client: GradioClient = createGradioClient(),
  apiName: string = env.GRADIO_API_NAME
): ReportInferenceClient => ({
  provider: 'gradio',
  async generateReport(panel) {
    const prediction = await client.predict(apiName, panelToGradioData(panel));
    const [markdown] = prediction.data;
    if (typeof markdown !== 'string') {
      throw new HttpError(502, 'Gradio returned a non-text report.', 'INFERENCE_PROVIDER_FAILURE', {
        eventId: prediction.eventId
      });
    }
    return markdown;
  }
});

const REPORT_SYSTEM_PROMPT = `You are a clinical biomarker analyst. Write a concise health report in markdown using exactly these parts, in this order:

Normal ranges as bullets: "- <Biomarker>: <low>-<high> <unit>".

A table whose header is "| Biomarker | Value | Status | Insight |" followed by a "|---|---|---|---|" separator and one row per biomarker.

${REPORT_HEADINGS.executiveSummary}
Numbered top priorities ("1. ...") followed by bullet key strengths ("- ...").

${REPORT_HEADINGS.systemAnalysis}
- Status: <one phrase>
- Explanation: <one or two sentences>

${REPORT_HEADINGS.actionPlan}
- Nutrition: <text>
- Lifestyle: <text>
- Medical: <text>
- Testing: <text>

${REPORT_HEADINGS.interactionAlerts}
One bullet per alert.

Put each section title on its own line with no other text. Do not wrap the report in code fences.`;

export const buildReportPrompt = (panel: BiomarkerPanel): string => {
  const measurements = LAB_FIELDS.map((field) => `- ${field}: ${panel[field]} ${PANEL_UNITS[field]}`).join('\n');

  return `Patient: ${panel.age} ${PANEL_UNITS.age} old ${panel.gender.toLowerCase()}, height ${panel.height} ${PANEL_UNITS.height}, weight ${panel.weight} ${PANEL_UNITS.weight}.

Blood biomarkers:
${measurements}

Write the report.`;
};

export const createOpenRouterInference = (
  client: OpenRouterChatClient = createOpenRouterClient(),
  model: string = env.OPENROUTER_REPORT_MODEL
): ReportInferenceClient => ({
  provider: 'openrouter',
  async generateReport(panel) {
    const completion = await client.createChatCompletion({
      model,
      temperature: 0.2,
      messages: [
        { role: 'system', content: REPORT_SYSTEM_PROMPT },
        { role: 'user', content: buildReportPrompt(panel) }
      ]
    });
    return completion.content;
  }
});

export const createReportInference = (provider: InferenceProvider = env.INFERENCE_PROVIDER): ReportInferenceClient =>
  provider === 'openrouter' ? createOpenRouterInference() : createGradioInference();
