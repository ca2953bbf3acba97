import { normalizeText, toCellText } from '../consistency/normalize';
import { TextRecord } from '../consistency/schema';

export const CANONICAL_FIELDS = ['id', 'objectiveId', 'objectiveText', 'activityText', 'detailText', 'year'] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type FieldMapping = Record<CanonicalField, string[]>;

export type RawRow = Record<string, unknown>;

/** Accepted column names per field, in priority order. */
export const DEFAULT_FIELD_MAPPING: FieldMapping = {
  id: ['id'],
  objectiveId: ['codigo objetivo', 'codigo del objetivo', 'id objetivo', 'objective id', 'objective_id'],
  objectiveText: [
    'objetivo especifico',
    'objetivos especificos',
    'objetivo',
    'objective',
    'objective text',
    'objective_text',
  ],
  activityText: [
    'actividad unica',
    'actividad relacionada',
    'actividad',
    'activity',
    'activity text',
    'activity_text',
  ],
  detailText: ['detalle de la actividad', 'detalle', 'detail', 'detail text', 'detail_text'],
  year: ['año', 'anio', 'year'],
};

export const mergeFieldMapping = (overrides: Partial<FieldMapping> = {}): FieldMapping => {
  const mapping: FieldMapping = { ...DEFAULT_FIELD_MAPPING };

  CANONICAL_FIELDS.forEach((field) => {
    const aliases = overrides[field];
    if (aliases) {
      mapping[field] = aliases;
    }
  });

  return mapping;
};

const indexColumns = (row: RawRow): Map<string, string> => {
  const columns = new Map<string, string>();
  Object.keys(row).forEach((key) => {
    const normalized = normalizeText(key);
    if (!columns.has(normalized)) {
      columns.set(normalized, key);
    }
  });
  return columns;
};

const pickField = (row: RawRow, columns: Map<string, string>, aliases: string[]): unknown => {
  for (const alias of aliases) {
    const key = columns.get(normalizeText(alias));
    if (key !== undefined) {
      return row[key];
    }
  }
  return undefined;
};

/**
 * Turns loosely-named rows into text records. Missing columns resolve to empty
 * strings and a missing id falls back to the 1-based row number.
 */
export const resolveRecords = (rows: RawRow[], overrides?: Partial<FieldMapping>): TextRecord[] => {
  const mapping = mergeFieldMapping(overrides);

  return rows.map((row, index) => {
    const columns = indexColumns(row);
    const field = (name: CanonicalField): string => toCellText(pickField(row, columns, mapping[name])).trim();

    const id = field('id');
    const objectiveId = field('objectiveId');
    const year = field('year');

    return {
      id: id || String(index + 1),
      ...(objectiveId ? { objectiveId } : {}),
      objectiveText: field('objectiveText'),
      activityText: field('activityText'),
      detailText: field('detailText'),
      ...(year ? { year } : {}),
    };
  });
};
