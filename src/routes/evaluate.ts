import { Request, Response, Router } from 'express';
import { z } from 'zod';

import { getConfig } from '../config';
import { EvaluatePayload, runEvaluation } from '../pipeline/evaluate';
import { createJob, updateJob } from '../store/jobs';
import { EvalQueued } from '../types';

const router = Router();

const aliasesSchema = z.array(z.string().min(1)).min(1).optional();

const idSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const evaluateSchema = z.object({
  strategy: z.enum(['similarity-ranking', 'keyword-groups']).optional(),
  rows: z.array(z.record(z.unknown())),
  catalog: z
    .array(
      z.object({
        objective_id: idSchema,
        objective_text: z.string(),
      }),
    )
    .optional(),
  field_mapping: z
    .object({
      id: aliasesSchema,
      objectiveId: aliasesSchema,
      objectiveText: aliasesSchema,
      activityText: aliasesSchema,
      detailText: aliasesSchema,
      year: aliasesSchema,
    })
    .optional(),
});

type EvaluateBody = z.infer<typeof evaluateSchema>;

const toPayload = (body: EvaluateBody): EvaluatePayload => ({
  strategy: body.strategy ?? getConfig().defaultStrategy,
  rows: body.rows,
  catalog: body.catalog?.map((entry) => ({
    objectiveId: entry.objective_id,
    objectiveText: entry.objective_text,
  })),
  fieldMapping: body.field_mapping,
});

const enqueueJob = (jobId: string, payload: EvaluatePayload): void => {
  setImmediate(() => {
    updateJob(jobId, { status: 'processing' });

    try {
      const result = runEvaluation(payload);

      updateJob(jobId, {
        status: 'completed',
        result,
      });
    } catch (error) {
      console.error(`Evaluation job ${jobId} failed:`, error);
      updateJob(jobId, {
        status: 'failed',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });
};

router.post('/', (req: Request, res: Response) => {
  const validation = evaluateSchema.safeParse(req.body);

  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.') || undefined,
      message: issue.message,
    }));

    return res.status(400).json({ errors: issues });
  }

  const job = createJob();

  enqueueJob(job.id, toPayload(validation.data));

  const queued: EvalQueued = { id: job.id, status: 'queued' };

  return res.status(202).json(queued);
});

export default router;
