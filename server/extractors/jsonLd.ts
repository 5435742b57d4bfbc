import JSON5 from 'json5';
import type { CheerioAPI } from './dom';
import { cleanInline, htmlToText } from './dom';

type JsonRecord = Record<string, unknown>;

export interface JobPostingFields {
  company: string | null;
  jobTitle: string | null;
  fullDescription: string | null;
  hiringManager: string | null;
}

const isRecord = (value: unknown): value is JsonRecord =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const parsePayload = (raw: string): unknown => {
  const trimmed = raw.trim().replace(/^<!--/, '').replace(/-->$/, '').trim();
  if (!trimmed) return null;
  try {
    return JSON.parse(trimmed);
  } catch {
    try {
      // Hand-written blocks often carry trailing commas or comments
      return JSON5.parse(trimmed);
    } catch {
      return null;
    }
  }
};

const hasJobPostingType = (node: JsonRecord): boolean => {
  const type = node['@type'];
  if (typeof type === 'string') return type.toLowerCase() === 'jobposting';
  if (Array.isArray(type)) {
    return type.some((entry) => typeof entry === 'string' && entry.toLowerCase() === 'jobposting');
  }
  return false;
};

const collectJobPostings = (value: unknown, out: JsonRecord[], depth = 0): void => {
  if (depth > 6) return;
  if (Array.isArray(value)) {
    for (const entry of value) collectJobPostings(entry, out, depth + 1);
    return;
  }
  if (!isRecord(value)) return;
  if (hasJobPostingType(value)) out.push(value);
  if (value['@graph'] !== undefined) collectJobPostings(value['@graph'], out, depth + 1);
  if (value.mainEntity !== undefined) collectJobPostings(value.mainEntity, out, depth + 1);
};

/** Every JSON-LD `JobPosting` node on the page, in document order. */
export const findJobPostings = ($: CheerioAPI): JsonRecord[] => {
  const postings: JsonRecord[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const payload = parsePayload($(el).html() ?? '');
    collectJobPostings(payload, postings);
  });
  return postings;
};

const stringValue = (value: unknown): string | null => {
  if (typeof value === 'string') {
    const cleaned = cleanInline(value);
    return cleaned || null;
  }
  return null;
};

const nameOf = (value: unknown): string | null => {
  if (Array.isArray(value)) {
    for (const entry of value) {
      const name = nameOf(entry);
      if (name) return name;
    }
    return null;
  }
  if (isRecord(value)) return stringValue(value.name);
  return stringValue(value);
};

const guard = <T>(read: () => T | null): T | null => {
  try {
    return read();
  } catch {
    return null;
  }
};

export const jobPostingFields = (posting: JsonRecord): JobPostingFields => ({
  company: guard(() => nameOf(posting.hiringOrganization)),
  jobTitle: guard(() => stringValue(posting.title) ?? stringValue(posting.name)),
  fullDescription: guard(() => {
    const description = posting.description;
    if (typeof description !== 'string') return null;
    return htmlToText(description) || null;
  }),
  hiringManager: guard(() => nameOf(posting.applicationContact)),
});

/** Fields of the first JobPosting, with gaps filled from later ones. */
export const readJobPosting = ($: CheerioAPI): JobPostingFields | null => {
  const postings = findJobPostings($);
  if (!postings.length) return null;
  const merged: JobPostingFields = { company: null, jobTitle: null, fullDescription: null, hiringManager: null };
  for (const posting of postings) {
    const fields = jobPostingFields(posting);
    merged.company ??= fields.company;
    merged.jobTitle ??= fields.jobTitle;
    merged.fullDescription ??= fields.fullDescription;
    merged.hiringManager ??= fields.hiringManager;
  }
  return merged;
};
