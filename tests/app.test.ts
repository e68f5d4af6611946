import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import { z } from 'zod';
import { createApp } from '../src/app';
import { AIResponseValidationError } from '../src/services/aiService';
import { JobScrapeError } from '../src/services/jobService';
import { KeyPool } from '../src/utils/keyPool';
import type {
  GenerationRequest,
  JobScraper,
  JobSearchParams,
  JobSearchResult,
  TextGenerator,
} from '../src/models/types';

const A = 'alpha-key-0001';
const B = 'bravo-key-0002';
const COOLDOWN_MS = 5 * 60_000;

const fakeGenerate: TextGenerator = async (_key: string, request: GenerationRequest) =>
  request.prompt.endsWith('Tailored CV:') ? 'SUMMARY\nTailored summary' : 'Dear hiring team,';

const tailorBodySchema = z.object({
  cv_pdf: z.string(),
  cover_letter_pdf: z.string(),
  api_key_used: z.string(),
  attempt: z.number(),
});

const validationBodySchema = z.object({
  error: z.string(),
  issues: z.array(z.object({ path: z.array(z.union([z.string(), z.number()])) })),
});

const scrapeBodySchema = z.object({
  count: z.number(),
  jobs: z.array(z.object({ id: z.string() })),
  errors: z.array(z.string()),
});

class FakeScraper implements JobScraper {
  public calls: JobSearchParams[] = [];
  public result: JobSearchResult | Error = { jobs: [], errors: [] };

  async search(params: JobSearchParams): Promise<JobSearchResult> {
    this.calls.push(params);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

describe('HTTP API', () => {
  let now: number;
  let keyPool: KeyPool;
  let scraper: FakeScraper;
  let server: Server | null;

  const start = async (generateText: TextGenerator = fakeGenerate) => {
    const app = createApp({
      config: { appName: 'Test API', corsOrigin: '*' },
      keyPool,
      generateText,
      jobScraper: scraper,
    });
    const listening = app.listen(0);
    server = listening;
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
    const address = listening.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  };

  const postJson = (url: string, body: unknown) =>
    fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  beforeEach(() => {
    now = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    keyPool = new KeyPool({ keys: [A, B], cooldownMs: COOLDOWN_MS, now: () => now });
    scraper = new FakeScraper();
    server = null;
  });

  afterEach(async () => {
    const running = server;
    if (running) {
      await new Promise<void>((resolve, reject) =>
        running.close((err) => (err ? reject(err) : resolve())),
      );
    }
    vi.restoreAllMocks();
  });

  describe('health', () => {
    it('should answer on / and /health', async () => {
      const base = await start();

      expect(await (await fetch(`${base}/`)).json()).toEqual({ status: 'Test API is running' });
      expect(await (await fetch(`${base}/health`)).json()).toEqual({ status: 'healthy' });
    });

    it('should render the key pool status', async () => {
      keyPool.reportFailure(A, { rateLimited: true });
      now = 60_000;
      const base = await start();

      const res = await fetch(`${base}/api-keys/status`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        total_keys: 2,
        available_keys: 1,
        cooling_down_keys: 1,
        cooldown_minutes: 5,
        failure_threshold: 0,
        has_available_keys: true,
        keys: [
          {
            key: 'alph...0001',
            state: 'cooling_down',
            consecutive_failures: 1,
            cooldown_remaining_seconds: 240,
            last_used_at: null,
          },
          {
            key: 'brav...0002',
            state: 'available',
            consecutive_failures: 0,
            cooldown_remaining_seconds: 0,
            last_used_at: null,
          },
        ],
      });
    });

    it('should return 404 for unknown routes', async () => {
      const base = await start();

      const res = await fetch(`${base}/nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not found' });
    });
  });

  describe('POST /tailor-cv', () => {
    it('should return texts and PDFs from the first key', async () => {
      const generate = vi.fn(fakeGenerate);
      const base = await start(generate);

      const res = await postJson(`${base}/tailor-cv`, {
        title: 'Backend Engineer',
        description: 'Node.js APIs',
      });
      const raw: unknown = await res.json();
      const body = tailorBodySchema.parse(raw);

      expect(res.status).toBe(200);
      expect(raw).toMatchObject({
        success: true,
        cv_text: 'SUMMARY\nTailored summary',
        cover_letter_text: 'Dear hiring team,',
        job_title: 'Backend Engineer',
        company: 'N/A',
        url: null,
        api_key_used: 'alph...0001',
        attempt: 1,
        message: 'CV and Cover Letter PDFs generated successfully',
      });
      expect(Buffer.from(body.cv_pdf, 'base64').subarray(0, 5).toString('latin1')).toBe('%PDF-');
      expect(Buffer.from(body.cover_letter_pdf, 'base64').subarray(0, 5).toString('latin1')).toBe(
        '%PDF-',
      );
      expect(generate.mock.calls[0][1].prompt).toContain('Original CV:\nAlex Example');
    });

    it('should use the CV sent with the request', async () => {
      const generate = vi.fn(fakeGenerate);
      const base = await start(generate);

      await postJson(`${base}/tailor-cv`, {
        title: 'Backend Engineer',
        description: '',
        cv_template: 'Jamie Placeholder',
      });

      expect(generate.mock.calls[0][1].prompt).toContain('Original CV:\nJamie Placeholder');
    });

    it('should fail over to the next key on a rate limit', async () => {
      const base = await start(async (key, request) => {
        if (key === A) {
          throw Object.assign(new Error('Resource has been exhausted'), { status: 429 });
        }
        return fakeGenerate(key, request);
      });

      const res = await postJson(`${base}/tailor-cv`, { title: 'Backend Engineer' });
      const body = tailorBodySchema.parse(await res.json());

      expect(res.status).toBe(200);
      expect(body.attempt).toBe(2);
      expect(body.api_key_used).toBe('brav...0002');
      expect(keyPool.status()[0].state).toBe('cooling_down');
    });

    it('should answer 503 with Retry-After when every key is cooling down', async () => {
      keyPool.reportFailure(A, { rateLimited: true });
      keyPool.reportFailure(B, { rateLimited: true });
      const base = await start();

      const res = await postJson(`${base}/tailor-cv`, { title: 'Backend Engineer' });

      expect(res.status).toBe(503);
      expect(res.headers.get('retry-after')).toBe('300');
      expect(await res.json()).toEqual({
        error: 'All API keys are temporarily rate-limited. Please try again later.',
        retryAfter: 300,
      });
    });

    it('should answer 503 when every attempt fails', async () => {
      const base = await start(async () => {
        throw new Error('socket hang up');
      });

      const res = await postJson(`${base}/tailor-cv`, { title: 'Backend Engineer' });

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: 'AI service unavailable',
        message: 'TailorCV: failed after 2 attempt(s). Last error: socket hang up',
        attempts: 2,
      });
    });

    it('should answer 502 when the AI reply is empty', async () => {
      const base = await start(async () => {
        throw new AIResponseValidationError('Empty response from AI');
      });

      const res = await postJson(`${base}/tailor-cv`, { title: 'Backend Engineer' });

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        error: 'AI response failed validation',
        message: 'Empty response from AI',
      });
    });

    it('should reject a request without a title', async () => {
      const base = await start();

      const res = await postJson(`${base}/tailor-cv`, { company: 'Sample Corp' });
      const body = validationBodySchema.parse(await res.json());

      expect(res.status).toBe(400);
      expect(body.error).toBe('Validation error');
      expect(body.issues[0].path).toEqual(['title']);
    });

    it('should reject malformed JSON', async () => {
      const base = await start();

      const res = await fetch(`${base}/tailor-cv`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"title":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
    });
  });

  describe('POST /scrape', () => {
    it('should apply request defaults', async () => {
      const base = await start();

      const res = await postJson(`${base}/scrape`, {});

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ jobs: [], count: 0, errors: [] });
      expect(scraper.calls).toEqual([
        {
          sites: ['remotive', 'arbeitnow'],
          searchTerm: 'developer',
          location: 'Remote',
          resultsWanted: 20,
          hoursOld: 72,
          isRemote: true,
          experienceLevel: undefined,
        },
      ]);
    });

    it('should return the scraped jobs with a count', async () => {
      scraper.result = {
        jobs: [
          {
            id: 'remotive-7',
            site: 'remotive',
            title: 'Developer',
            company: 'Co',
            location: 'Worldwide',
            is_remote: true,
            job_url: 'https://jobs.example/7',
            job_type: null,
            salary: null,
            date_posted: null,
            description: 'Build things',
          },
        ],
        errors: ['arbeitnow: HTTP 500'],
      };
      const base = await start();

      const res = await postJson(`${base}/scrape`, {
        sites: ['remotive'],
        search_term: 'typescript',
        experience_level: 'junior',
      });
      const body = scrapeBodySchema.parse(await res.json());

      expect(body.count).toBe(1);
      expect(body.jobs[0].id).toBe('remotive-7');
      expect(body.errors).toEqual(['arbeitnow: HTTP 500']);
      expect(scraper.calls[0]).toMatchObject({
        sites: ['remotive'],
        searchTerm: 'typescript',
        experienceLevel: 'junior',
      });
    });

    it('should query each requested board once', async () => {
      const base = await start();

      const res = await postJson(`${base}/scrape`, { sites: ['remotive', 'remotive'] });

      expect(res.status).toBe(200);
      expect(scraper.calls[0].sites).toEqual(['remotive']);
    });

    it('should reject unknown sites', async () => {
      const base = await start();

      const res = await postJson(`${base}/scrape`, { sites: ['somewhere'] });

      expect(res.status).toBe(400);
      expect(scraper.calls).toHaveLength(0);
    });

    it('should answer 502 when every board fails', async () => {
      scraper.result = new JobScrapeError(['remotive: HTTP 503']);
      const base = await start();

      const res = await postJson(`${base}/scrape`, {});

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        error: 'Job boards unavailable',
        details: ['remotive: HTTP 503'],
      });
    });
  });
});
