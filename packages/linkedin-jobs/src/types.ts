/**
 * Shape of a single job as the LinkedIn Job Search API returns it. Every field
 * is optional: the normalizer falls back per field and never trusts this type,
 * it only documents what the upstream sends.
 */
export interface LinkedInJobPayload {
  id?: string;
  title?: string | null;
  organization?: string | null;
  linkedin_org_industry?: string | null;
  locations_derived?: string[] | null;
  location?: string | null;
  date_posted?: string | null;
  posted_at?: string | null;
  description_text?: string | null;
  description?: string | null;
  url?: string | null;
  apply_url?: string | null;
  employment_type?: string[] | null;
  remote_derived?: boolean | null;
  remote?: boolean | null;
  salary_raw?: string | LinkedInMonetaryAmount | null;
}

export interface LinkedInMonetaryAmount {
  '@type'?: string;
  currency?: string;
  value?: {
    '@type'?: string;
    value?: number;
    minValue?: number;
    maxValue?: number;
    unitText?: string;
  };
}

/** Either a bare list of jobs or a wrapper object around one. */
export type LinkedInSearchResponse = LinkedInJobPayload[] | { jobs: LinkedInJobPayload[] };

/** Fetch signature the client needs; the global `fetch` satisfies it. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
