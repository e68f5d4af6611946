export interface GenerationRequest {
  systemPrompt: string;
  prompt: string;
}

/** Calls the AI API with one key and resolves to the reply text */
export type TextGenerator = (apiKey: string, request: GenerationRequest) => Promise<string>;

export interface TailorInput {
  title: string;
  company: string;
  description: string;
  cvTemplate: string;
}

export interface TailoredContent {
  cvText: string;
  coverLetterText: string;
}

export type JobSite = "remotive" | "arbeitnow";

export interface JobListing {
  id: string;
  site: JobSite;
  title: string;
  company: string;
  location: string | null;
  is_remote: boolean;
  job_url: string;
  job_type: string | null;
  salary: string | null;
  date_posted: string | null; // ISO-8601
  description: string;
}

export interface JobSearchParams {
  sites: JobSite[];
  searchTerm: string;
  location: string;
  resultsWanted: number;
  hoursOld: number;
  isRemote: boolean;
  experienceLevel?: string;
}

export interface JobSearchResult {
  jobs: JobListing[];
  errors: string[];
}

export interface JobScraper {
  search(params: JobSearchParams): Promise<JobSearchResult>;
}
