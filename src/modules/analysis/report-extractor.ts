import {
  ACTION_PLAN_CATEGORIES,
  type ActionPlan,
  type BiomarkerReport,
  type BiomarkerTableRow,
  type ExecutiveSummary,
  type SystemAnalysis
} from './types';

export const REPORT_HEADINGS = {
  executiveSummary: 'Executive Summary',
  systemAnalysis: 'System-Specific Analysis',
  actionPlan: 'Personalized Action Plan',
  interactionAlerts: 'Interaction Alerts'
} as const;

export const DEFAULT_SYSTEM_ANALYSIS: SystemAnalysis = {
  status: 'Unknown',
  explanation: 'No system analysis provided.'
};

const CODE_BLOCK = /```[\s\S]*?```/g;
const NORMAL_RANGE = /- ([A-Za-z ]+): ((?:[<>≤≥]=?\s*)?[0-9.\-–].*)/g;
const TABLE_HEADER = /^\|\s*Biomarker\s*\|\s*Value\s*\|/;
const TABLE_SEPARATOR_CELL = /^:?-+:?$/;
const NUMBERED_ITEM = /^\s*\d+\.\s+(.+)$/;
const BULLET_ITEM = /^\s*[-*]\s+(.+)$/;
const STRENGTH_TOKENS = /Normal|within|good|optimal/;
const STATUS_LINE = /^\s*[-*]\s*[*_]*Status[*_]*:[*_]*\s*(.*)$/;
const EXPLANATION_LINE = /^\s*[-*]\s*[*_]*Explanation[*_]*:[*_]*\s*(.*)$/;
const CATEGORY_LINE = /^\s*[-*]\s+[*_]*([A-Za-z]+)[*_]*:[*_]*\s*(.*)$/;
const BULLET_MARKER = /^[-*•]\s+/;
const HORIZONTAL_RULE = /^[-*_]{3,}$/;

const KNOWN_HEADINGS = Object.values(REPORT_HEADINGS).map((heading) => heading.toLowerCase());
// Numbering, emoji and other markers may precede a title, but never words.
const HEADING_PREFIX = /^(?:[^\p{L}]*[\s.*_:)])?$/u;

export const createEmptyReport = (): BiomarkerReport => ({
  normal_ranges: {},
  biomarker_table: [],
  executive_summary: { top_priorities: [], key_strengths: [] },
  system_analysis: { ...DEFAULT_SYSTEM_ANALYSIS },
  action_plan: { nutrition: '', lifestyle: '', medical: '', testing: '' },
  interaction_alerts: []
});

/**
 * Reduces a heading line to its bare title: `## **Executive Summary**:` becomes
 * `executive summary`.
 */
const headingTitle = (line: string): string =>
  line
    .trim()
    .replace(/^#{1,6}\s*/, '')
    .replace(/:\s*$/, '')
    .replace(/^[*_]+|[*_]+$/g, '')
    .replace(/:\s*$/, '')
    .trim()
    .toLowerCase();

const isHeading = (line: string, title: string): boolean => {
  const bare = headingTitle(line);
  if (!bare.endsWith(title)) {
    return false;
  }
  return HEADING_PREFIX.test(bare.slice(0, bare.length - title.length));
};

const findHeading = (lines: string[], title: string, from = 0): number => {
  const wanted = title.toLowerCase();
  for (let index = from; index < lines.length; index += 1) {
    if (isHeading(lines[index], wanted)) {
      return index;
    }
  }
  return -1;
};

const findAnyHeading = (lines: string[], from: number): number => {
  for (let index = from; index < lines.length; index += 1) {
    if (KNOWN_HEADINGS.some((heading) => isHeading(lines[index], heading))) {
      return index;
    }
  }
  return -1;
};

/**
 * Lines between `title` and `until`. Without `until`, or when that heading is missing,
 * the section stops at the next known report heading. Returns null when `title` is absent.
 */
const sectionLines = (lines: string[], title: string, until?: string | null): string[] | null => {
  const start = findHeading(lines, title);
  if (start === -1) {
    return null;
  }

  if (until === null) {
    return lines.slice(start + 1);
  }

  const explicitEnd = until ? findHeading(lines, until, start + 1) : -1;
  const end = explicitEnd !== -1 ? explicitEnd : findAnyHeading(lines, start + 1);

  return lines.slice(start + 1, end === -1 ? lines.length : end);
};

const splitTableRow = (line: string): string[] =>
  line
    .replace(/^\|+|\|+$/g, '')
    .split('|')
    .map((cell) => cell.trim());

export const extractNormalRanges = (text: string): Record<string, string> => {
  const ranges: Record<string, string> = {};
  for (const match of text.matchAll(NORMAL_RANGE)) {
    const name = match[1].trim();
    if (name.length === 0) {
      continue;
    }
    ranges[name] = match[2].trim();
  }
  return ranges;
};

export const extractBiomarkerTable = (lines: string[]): BiomarkerTableRow[] => {
  const headerIndex = lines.findIndex((line) => TABLE_HEADER.test(line.trim()));
  if (headerIndex === -1) {
    return [];
  }

  const rows: BiomarkerTableRow[] = [];
  for (let index = headerIndex + 1; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (!line.startsWith('|')) {
      break;
    }

    const cells = splitTableRow(line);
    if (cells.every((cell) => TABLE_SEPARATOR_CELL.test(cell))) {
      continue;
    }
    if (cells.length !== 4) {
      continue;
    }

    const [biomarker, value, status, insight] = cells;
    rows.push({ biomarker, value, status, insight });
  }

  return rows;
};

export const extractExecutiveSummary = (lines: string[]): ExecutiveSummary => {
  const summary: ExecutiveSummary = { top_priorities: [], key_strengths: [] };
  const section = sectionLines(lines, REPORT_HEADINGS.executiveSummary, REPORT_HEADINGS.systemAnalysis);
  if (!section) {
    return summary;
  }

  for (const line of section) {
    const numbered = NUMBERED_ITEM.exec(line);
    if (numbered) {
      summary.top_priorities.push(numbered[1].trim());
      continue;
    }

    const bullet = BULLET_ITEM.exec(line);
    if (bullet && STRENGTH_TOKENS.test(bullet[1])) {
      summary.key_strengths.push(bullet[1].trim());
    }
  }

  return summary;
};

export const extractSystemAnalysis = (lines: string[]): SystemAnalysis => {
  const section = sectionLines(lines, REPORT_HEADINGS.systemAnalysis);
  if (!section) {
    return { ...DEFAULT_SYSTEM_ANALYSIS };
  }

  let status: string | undefined;
  let explanation: string | undefined;
  for (const line of section) {
    if (status === undefined) {
      status = STATUS_LINE.exec(line)?.[1];
    }
    if (explanation === undefined) {
      explanation = EXPLANATION_LINE.exec(line)?.[1];
    }
  }

  if (status === undefined || explanation === undefined) {
    return { ...DEFAULT_SYSTEM_ANALYSIS };
  }

  return { status: status.trim(), explanation: explanation.trim() };
};

export const extractActionPlan = (lines: string[]): ActionPlan => {
  const plan: ActionPlan = { nutrition: '', lifestyle: '', medical: '', testing: '' };
  const section = sectionLines(lines, REPORT_HEADINGS.actionPlan, REPORT_HEADINGS.interactionAlerts);
  if (!section) {
    return plan;
  }

  for (const line of section) {
    const match = CATEGORY_LINE.exec(line);
    if (!match) {
      continue;
    }

    const key = match[1].toLowerCase();
    const category = ACTION_PLAN_CATEGORIES.find((candidate) => candidate === key);
    if (category) {
      plan[category] = match[2].trim();
    }
  }

  return plan;
};

export const extractInteractionAlerts = (lines: string[]): string[] => {
  const section = sectionLines(lines, REPORT_HEADINGS.interactionAlerts, null);
  if (!section) {
    return [];
  }

  const alerts: string[] = [];
  for (const line of section) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('```') || HORIZONTAL_RULE.test(trimmed)) {
      continue;
    }

    const alert = trimmed.replace(BULLET_MARKER, '').trim();
    if (alert) {
      alerts.push(alert);
    }
  }

  return alerts;
};

/**
 * Turns the model's markdown answer into a `BiomarkerReport`. Total over all strings:
 * a section that cannot be found leaves its field at the default.
 */
export const extractBiomarkerReport = (markdown: string): BiomarkerReport => {
  const report = createEmptyReport();
  if (!markdown) {
    return report;
  }

  const text = markdown.replace(/\r\n?/g, '\n').replace(CODE_BLOCK, '');
  const lines = text.split('\n');

  report.normal_ranges = extractNormalRanges(text);
  report.biomarker_table = extractBiomarkerTable(lines);
  report.executive_summary = extractExecutiveSummary(lines);
  report.system_analysis = extractSystemAnalysis(lines);
  report.action_plan = extractActionPlan(lines);
  report.interaction_alerts = extractInteractionAlerts(lines);

  return report;
};
