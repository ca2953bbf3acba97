import { Request, Response, Router } from 'express';

import { getJob, JobRecord } from '../store/jobs';
import { CompletedStatus } from '../types';

const router = Router();

const findJob = (req: Request, res: Response): JobRecord | undefined => {
  const job = getJob(req.params.id ?? '');

  if (!job) {
    res.status(404).json({ error: 'Job not found' });
  }

  return job;
};

router.get('/:id', (req: Request, res: Response) => {
  const job = findJob(req, res);
  if (!job) {
    return;
  }

  if (job.status === 'completed' && job.result) {
    const completed: CompletedStatus = { id: job.id, status: 'completed', result: job.result };
    res.json(completed);
    return;
  }

  if (job.status === 'failed') {
    res.json({ id: job.id, status: job.status, error: job.error });
    return;
  }

  res.json({ id: job.id, status: job.status });
});

router.get('/:id/summary', (req: Request, res: Response) => {
  const job = findJob(req, res);
  if (!job) {
    return;
  }

  if (job.status !== 'completed' || !job.result) {
    res.status(409).json({ id: job.id, status: job.status, error: 'Evaluation has not completed' });
    return;
  }

  res.json({ id: job.id, strategy: job.result.strategy, summary: job.result.summary });
});

export default router;
