const plainDecimal = /^\d+(\.\d+)?$/;
const groupedDecimal = /^\d{1,3}(,\d{3})+(\.\d+)?$/;

/**
 * Converts a model-written amount such as "150.75" or "1,500.00" into a number.
 * Returns null for anything that is not a plain non-negative decimal string.
 */
export const parseAmount = (raw: string): number | null => {
  const trimmed = raw.trim();

  if (!plainDecimal.test(trimmed) && !groupedDecimal.test(trimmed)) {
    return null;
  }

  const amount = Number(trimmed.replace(/,/g, ''));
  return Number.isFinite(amount) ? amount : null;
};
