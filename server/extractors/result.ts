import { NOT_SPECIFIED, type ExtractionResult, type SiteId } from '../../shared/types';

export interface ExtractionFields {
  company?: string | null;
  jobTitle?: string | null;
  fullDescription?: string | null;
  hiringManager?: string | null;
}

export const isSpecified = (value: string | null | undefined): value is string => {
  if (value == null) return false;
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed !== NOT_SPECIFIED;
};

export const hasMinimumData = (fields: Pick<ExtractionResult, 'company' | 'jobTitle' | 'fullDescription'>): boolean =>
  isSpecified(fields.company) && isSpecified(fields.jobTitle) && isSpecified(fields.fullDescription);

/**
 * The only way results are built: normalizes sentinels and derives
 * `isComplete` from the fields.
 */
export const buildExtractionResult = (
  fields: ExtractionFields,
  adSource: SiteId,
  method: string,
): ExtractionResult => {
  const company = isSpecified(fields.company) ? fields.company.trim() : NOT_SPECIFIED;
  const jobTitle = isSpecified(fields.jobTitle) ? fields.jobTitle.trim() : NOT_SPECIFIED;
  const fullDescription = isSpecified(fields.fullDescription) ? fields.fullDescription.trim() : NOT_SPECIFIED;
  const hiringManager = isSpecified(fields.hiringManager) ? fields.hiringManager.trim() : '';

  return Object.freeze({
    company,
    jobTitle,
    fullDescription,
    hiringManager,
    adSource,
    method,
    isComplete: hasMinimumData({ company, jobTitle, fullDescription }),
  });
};

export const FAILED_SUFFIX = '-failed';

export const failedResult = (adSource: SiteId, method: string): ExtractionResult =>
  buildExtractionResult({}, adSource, `${method}${FAILED_SUFFIX}`);

export const isFailedMethod = (method: string): boolean => method.endsWith(FAILED_SUFFIX);
