import type { ExtractionResult, SiteId } from '../../shared/types';
import type { CheerioAPI } from './dom';
import type { JobPostingFields } from './jsonLd';

export interface StructuredExtractor {
  readonly site: SiteId;
  /** Provenance tag, e.g. `cheerio-linkedin`. */
  readonly method: string;
  /** Pure: no network, no clock. `html === null` yields a `<method>-failed` result. */
  parse(html: string | null, url: string): ExtractionResult;
}

/** What a field reader sees: the parsed page plus its JSON-LD posting, if any. */
export interface PageContext {
  $: CheerioAPI;
  url: string;
  jsonLd: JobPostingFields | null;
}

export type FieldReader = (page: PageContext) => string | null;

export interface FieldReaders {
  company: FieldReader;
  jobTitle: FieldReader;
  fullDescription: FieldReader;
  hiringManager: FieldReader;
}
