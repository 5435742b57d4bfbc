import type { SiteId } from '../../shared/types';

const SITE_HOSTS: ReadonlyArray<[needle: string, site: SiteId]> = [
  ['linkedin.com', 'linkedin'],
  ['indeed.com', 'indeed'],
  ['glassdoor.com', 'glassdoor'],
];

const hostOf = (url: string): string => {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return url.trim().toLowerCase();
  }
};

export const classifySite = (url: string): SiteId => {
  const host = hostOf(url);
  for (const [needle, site] of SITE_HOSTS) {
    if (host.includes(needle)) return site;
  }
  return 'generic';
};
