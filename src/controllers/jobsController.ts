import { Router } from "express";
import { jobSearchRequestSchema } from "../models/schemas";
import type { JobScraper } from "../models/types";

export const createJobsController = (scraper: JobScraper) => {
  const router = Router();

  router.post("/scrape", async (req, res, next) => {
    try {
      const body = jobSearchRequestSchema.parse(req.body);

      const { jobs, errors } = await scraper.search({
        sites: body.sites,
        searchTerm: body.search_term,
        location: body.location,
        resultsWanted: body.results_wanted,
        hoursOld: body.hours_old,
        isRemote: body.is_remote,
        experienceLevel: body.experience_level,
      });

      res.json({ jobs, count: jobs.length, errors });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
