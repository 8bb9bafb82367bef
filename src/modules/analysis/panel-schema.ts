import { GENDERS, PANEL_EXAMPLE, PANEL_FIELDS, PANEL_UNITS, type PanelField } from './types';

type FieldSchema = {
  type: 'number' | 'integer' | 'string';
  description: string;
  example: number | string;
  enum?: readonly string[];
  minimum?: number;
  exclusiveMinimum?: number;
};

export type PanelSchemaDocument = {
  title: string;
  type: 'object';
  required: readonly PanelField[];
  properties: Record<string, FieldSchema>;
  example: typeof PANEL_EXAMPLE;
};

const describeField = (field: PanelField): FieldSchema => {
  if (field === 'gender') {
    return { type: 'string', enum: GENDERS, description: "Select 'Male' or 'Female'", example: PANEL_EXAMPLE.gender };
  }

  const base = { description: PANEL_UNITS[field], example: PANEL_EXAMPLE[field] };
  if (field === 'age') {
    return { type: 'integer', minimum: 0, ...base };
  }
  if (field === 'height' || field === 'weight') {
    return { type: 'number', exclusiveMinimum: 0, ...base };
  }
  return { type: 'number', ...base };
};

/**
 * JSON Schema for the `POST /analyze` body, mirroring `biomarkerPanelSchema` with the unit of
 * each measurement as its description.
 */
export const describePanelSchema = (): PanelSchemaDocument => ({
  title: 'BiomarkerPanel',
  type: 'object',
  required: PANEL_FIELDS,
  properties: Object.fromEntries(PANEL_FIELDS.map((field) => [field, describeField(field)])),
  example: PANEL_EXAMPLE
});
