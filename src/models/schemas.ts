import { z } from "zod";

export const jobSiteSchema = z.enum(["remotive", "arbeitnow"]);

export const jobSearchRequestSchema = z.object({
  sites: z
    .array(jobSiteSchema)
    .min(1)
    .default(["remotive", "arbeitnow"])
    .transform((sites) => [...new Set(sites)]),
  search_term: z.string().trim().default("developer"),
  location: z.string().trim().default("Remote"),
  results_wanted: z.number().int().min(1).max(100).default(20),
  hours_old: z.number().int().positive().default(72),
  is_remote: z.boolean().default(true),
  experience_level: z.string().trim().min(1).optional(),
});

export const tailorCvRequestSchema = z.object({
  title: z.string().trim().min(1),
  company: z.string().trim().min(1).default("N/A"),
  description: z.string().default(""),
  url: z.string().url().optional(),
  cv_template: z.string().trim().min(1).optional(),
});

export type JobSearchRequest = z.infer<typeof jobSearchRequestSchema>;
export type TailorCvRequest = z.infer<typeof tailorCvRequestSchema>;
