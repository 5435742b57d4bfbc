import type { SiteId } from '../../shared/types';
import { genericExtractor } from './generic';
import { glassdoorExtractor } from './glassdoor';
import { indeedExtractor } from './indeed';
import { linkedinExtractor } from './linkedin';
import type { StructuredExtractor } from './types';

const EXTRACTORS: Record<SiteId, StructuredExtractor> = {
  linkedin: linkedinExtractor,
  indeed: indeedExtractor,
  glassdoor: glassdoorExtractor,
  generic: genericExtractor,
};

export const getStructuredExtractor = (site: SiteId): StructuredExtractor => EXTRACTORS[site];
