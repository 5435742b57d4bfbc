/** Single-line preview of `value`, ellipsized at `maxLength`. */
export const buildExcerpt = (value: string | null | undefined, maxLength = 600): string => {
  if (!value) return '';
  const normalized = value.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, Math.max(0, maxLength - 3)).trim()}...`;
};
