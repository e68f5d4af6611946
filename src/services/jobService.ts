import * as cheerio from "cheerio";
import { z } from "zod";
import type {
  JobListing,
  JobScraper,
  JobSearchParams,
  JobSearchResult,
  JobSite,
} from "../models/types";

const REMOTIVE_URL = "https://remotive.com/api/remote-jobs";
const ARBEITNOW_URL = "https://www.arbeitnow.com/api/job-board-api";

export class JobScrapeError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Job scraping failed: ${errors.join("; ")}`);
    this.name = "JobScrapeError";
    this.errors = errors;
  }
}

const remotiveResponseSchema = z.object({
  jobs: z.array(
    z.object({
      id: z.union([z.number(), z.string()]),
      url: z.string(),
      title: z.string(),
      company_name: z.string(),
      job_type: z.string().nullish(),
      publication_date: z.string().nullish(),
      candidate_required_location: z.string().nullish(),
      salary: z.string().nullish(),
      description: z.string().nullish(),
    }),
  ),
});

const arbeitnowResponseSchema = z.object({
  data: z.array(
    z.object({
      slug: z.string(),
      url: z.string(),
      title: z.string(),
      company_name: z.string(),
      description: z.string().nullish(),
      remote: z.boolean().default(false),
      location: z.string().nullish(),
      job_types: z.array(z.string()).default([]),
      created_at: z.number().nullish(), // unix seconds
    }),
  ),
});

export const stripHtml = (html: string) => {
  const $ = cheerio.load(html);
  $("script, style").remove();
  $("br").replaceWith("\n");
  $("p, li, h1, h2, h3, h4, h5, h6").after("\n");

  return $.root()
    .text()
    .replace(/[ \t\u00a0]+/g, " ")
    .replace(/\s*\n\s*/g, "\n")
    .trim();
};

const toIsoDate = (value: Date) => (Number.isNaN(value.getTime()) ? null : value.toISOString());

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const fetchJson = async (url: string, timeoutMs: number): Promise<unknown> => {
  const response = await fetch(url, {
    headers: { Accept: "application/json" },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }

  return response.json();
};

type SiteFetcher = (params: JobSearchParams, timeoutMs: number) => Promise<JobListing[]>;

const fetchRemotive: SiteFetcher = async (params, timeoutMs) => {
  const query = new URLSearchParams({ limit: String(params.resultsWanted * 3) });
  if (params.searchTerm) {
    query.set("search", params.searchTerm);
  }

  const payload = remotiveResponseSchema.parse(
    await fetchJson(`${REMOTIVE_URL}?${query.toString()}`, timeoutMs),
  );

  return payload.jobs.map((job): JobListing => ({
    id: `remotive-${job.id}`,
    site: "remotive",
    title: job.title,
    company: job.company_name,
    location: job.candidate_required_location || null,
    is_remote: true,
    job_url: job.url,
    job_type: job.job_type || null,
    salary: job.salary || null,
    date_posted: job.publication_date ? toIsoDate(new Date(job.publication_date)) : null,
    description: stripHtml(job.description ?? ""),
  }));
};

// The board has no search parameter, so the term is matched here.
const fetchArbeitnow: SiteFetcher = async (params, timeoutMs) => {
  const payload = arbeitnowResponseSchema.parse(await fetchJson(ARBEITNOW_URL, timeoutMs));
  const term = params.searchTerm.toLowerCase();

  return payload.data
    .map((job): JobListing => ({
      id: `arbeitnow-${job.slug}`,
      site: "arbeitnow",
      title: job.title,
      company: job.company_name,
      location: job.location || null,
      is_remote: job.remote,
      job_url: job.url,
      job_type: job.job_types.join(", ") || null,
      salary: null,
      date_posted: job.created_at ? toIsoDate(new Date(job.created_at * 1000)) : null,
      description: stripHtml(job.description ?? ""),
    }))
    .filter(
      (job) =>
        !term ||
        [job.title, job.company, job.description].some((field) =>
          field.toLowerCase().includes(term),
        ),
    );
};

const SITE_FETCHERS: Record<JobSite, SiteFetcher> = {
  remotive: fetchRemotive,
  arbeitnow: fetchArbeitnow,
};

export const filterListings = (
  jobs: JobListing[],
  params: JobSearchParams,
  now: number,
): JobListing[] => {
  const maxAgeMs = params.hoursOld * 60 * 60 * 1000;
  const location = params.location.trim().toLowerCase();
  const experience = params.experienceLevel
    ? new RegExp(`${escapeRegExp(params.experienceLevel)}|0-3 years|entry level`, "i")
    : null;

  return jobs.filter((job) => {
    if (params.isRemote && !job.is_remote) return false;

    if (location && location !== "remote") {
      if (!job.location?.toLowerCase().includes(location)) return false;
    }

    if (job.date_posted) {
      const age = now - new Date(job.date_posted).getTime();
      if (age > maxAgeMs) return false;
    }

    if (experience && !experience.test(job.description)) return false;

    return true;
  });
};

export interface HttpJobScraperOptions {
  timeoutMs: number;
  now?: () => number;
}

export class HttpJobScraper implements JobScraper {
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor({ timeoutMs, now = Date.now }: HttpJobScraperOptions) {
    this.timeoutMs = timeoutMs;
    this.now = now;
  }

  async search(params: JobSearchParams): Promise<JobSearchResult> {
    console.log(
      `[JobService] Scraping "${params.searchTerm}" in ${params.location} from ${params.sites.join(", ")}`,
    );

    const settled = await Promise.allSettled(
      params.sites.map(async (site) => {
        const listings = await SITE_FETCHERS[site](params, this.timeoutMs);
        return filterListings(listings, params, this.now()).slice(0, params.resultsWanted);
      }),
    );

    const jobs: JobListing[] = [];
    const errors: string[] = [];

    settled.forEach((outcome, i) => {
      const site = params.sites[i];
      if (outcome.status === "fulfilled") {
        jobs.push(...outcome.value);
        return;
      }
      const message =
        outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      console.error(`[JobService] ${site} failed: ${message}`);
      errors.push(`${site}: ${message}`);
    });

    if (errors.length === params.sites.length) {
      throw new JobScrapeError(errors);
    }

    console.log(`[JobService] Found ${jobs.length} job(s)`);
    return { jobs, errors };
  }
}
