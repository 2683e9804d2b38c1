import type { Request, Response } from 'express';
import { z } from 'zod';
import { unfurl, type UnfurlDeps } from '../services/unfurlService';

const isWebUrl = (value: string): boolean => {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

export const UnfurlRequestSchema = z.object({
  url: z
    .string({ required_error: 'url is required', invalid_type_error: 'url must be a string' })
    .trim()
    .min(1, 'url is required')
    .refine(isWebUrl, 'url must be an absolute http(s) URL'),
});

export const createUnfurlHandler =
  (deps: UnfurlDeps) =>
  async (req: Request, res: Response): Promise<void> => {
    const parsed = UnfurlRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? 'Invalid request body';
      res.status(422).json({ success: false, error: message });
      return;
    }

    const result = await unfurl(parsed.data.url, deps);
    res.json(result);
  };
