export const GENDERS = ['Male', 'Female'] as const;

export type Gender = (typeof GENDERS)[number];

export type BiomarkerPanel = {
  albumin: number;
  creatinine: number;
  glucose: number;
  crp: number;
  mcv: number;
  rdw: number;
  alp: number;
  wbc: number;
  lymphocytes: number;
  age: number;
  gender: Gender;
  height: number;
  weight: number;
};

export type PanelField = keyof BiomarkerPanel;

export const LAB_FIELDS = ['albumin', 'creatinine', 'glucose', 'crp', 'mcv', 'rdw', 'alp', 'wbc', 'lymphocytes'] as const;

/**
 * Field order is the positional order the Gradio endpoint declares its inputs in.
 */
export const PANEL_FIELDS: readonly PanelField[] = [...LAB_FIELDS, 'age', 'gender', 'height', 'weight'];

export const PANEL_UNITS: Record<Exclude<PanelField, 'gender'>, string> = {
  albumin: 'g/dL',
  creatinine: 'mg/dL',
  glucose: 'mg/dL',
  crp: 'mg/L',
  mcv: 'fL',
  rdw: '%',
  alp: 'U/L',
  wbc: 'x10^9/L',
  lymphocytes: '%',
  age: 'years',
  height: 'cm',
  weight: 'kg'
};

export const PANEL_EXAMPLE: BiomarkerPanel = {
  albumin: 4.5,
  creatinine: 1.5,
  glucose: 160,
  crp: 2.5,
  mcv: 150,
  rdw: 15,
  alp: 146,
  wbc: 10.5,
  lymphocytes: 38,
  age: 30,
  gender: 'Male',
  height: 123,
  weight: 60
};

export type BiomarkerTableRow = {
  biomarker: string;
  value: string;
  status: string;
  insight: string;
};

export type ExecutiveSummary = {
  top_priorities: string[];
  key_strengths: string[];
};

export type SystemAnalysis = {
  status: string;
  explanation: string;
};

export const ACTION_PLAN_CATEGORIES = ['nutrition', 'lifestyle', 'medical', 'testing'] as const;

export type ActionPlanCategory = (typeof ACTION_PLAN_CATEGORIES)[number];

export type ActionPlan = Record<ActionPlanCategory, string>;

export type BiomarkerReport = {
  normal_ranges: Record<string, string>;
  biomarker_table: BiomarkerTableRow[];
  executive_summary: ExecutiveSummary;
  system_analysis: SystemAnalysis;
  action_plan: ActionPlan;
  interaction_alerts: string[];
};
