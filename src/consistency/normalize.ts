const COMBINING_MARKS = /[\u0300-\u036f]/g;

export const normalizeText = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'number' && Number.isNaN(value)) {
    return '';
  }

  return String(value)
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
};

// Raw string form of a cell: null-safe, otherwise untouched.
export const toCellText = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'number' && Number.isNaN(value)) {
    return '';
  }

  return String(value);
};

/**
 * Activity text with its detail appended. The detail is never scored alone:
 * a blank activity yields an empty string whatever the detail holds.
 */
export const composeActivityText = (record: { activityText?: unknown; detailText?: unknown }): string => {
  const activity = toCellText(record.activityText);
  if (!activity.trim()) {
    return '';
  }

  const detail = toCellText(record.detailText);
  return detail.trim() ? `${activity} ${detail}` : activity;
};
