import type { SiteId } from '../../shared/types';
import { loadDocument } from './dom';
import { readJobPosting } from './jsonLd';
import { buildExtractionResult, failedResult } from './result';
import type { FieldReader, FieldReaders, PageContext, StructuredExtractor } from './types';

export const PARSER_TAG = 'cheerio';

/** A field that throws is treated as missing; the other fields still run. */
const readField = (reader: FieldReader, page: PageContext): string | null => {
  try {
    return reader(page);
  } catch {
    return null;
  }
};

const readJsonLd = ($: PageContext['$']) => {
  try {
    return readJobPosting($);
  } catch {
    return null;
  }
};

export const createStructuredExtractor = (site: SiteId, readers: FieldReaders): StructuredExtractor => {
  const method = `${PARSER_TAG}-${site}`;
  return {
    site,
    method,
    parse(html, url) {
      if (html == null) {
        return failedResult(site, method);
      }
      const $ = loadDocument(html);
      const page: PageContext = { $, url, jsonLd: readJsonLd($) };
      return buildExtractionResult(
        {
          company: readField(readers.company, page),
          jobTitle: readField(readers.jobTitle, page),
          fullDescription: readField(readers.fullDescription, page),
          hiringManager: readField(readers.hiringManager, page),
        },
        site,
        method,
      );
    },
  };
};
