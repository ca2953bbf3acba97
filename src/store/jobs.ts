import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { getConfig } from '../config';
import { EvalResult, JobStatus } from '../types';

export type { JobStatus };

export type JobRecord = {
  id: string;
  status: JobStatus;
  createdAt: string;
  result?: EvalResult;
  error?: string;
};

const jobsById = new Map<string, JobRecord>();

let loaded = false;

const storePath = (): string => path.join(getConfig().dataDir, 'jobs.json');

const ensureDataDir = (): void => {
  fs.mkdirSync(getConfig().dataDir, { recursive: true });
};

const loadStoreFromDisk = (): void => {
  const filePath = storePath();
  if (!fs.existsSync(filePath)) {
    return;
  }

  try {
    const raw = fs.readFileSync(filePath, 'utf-8');
    if (!raw.trim()) {
      return;
    }

    const parsed = JSON.parse(raw) as JobRecord[] | Record<string, JobRecord>;
    const entriesArray = Array.isArray(parsed) ? parsed : Object.values(parsed ?? {});

    entriesArray.forEach((entry) => {
      if (entry?.id && entry?.status) {
        jobsById.set(entry.id, entry);
      }
    });
  } catch (error) {
    console.error('Failed to load job store from disk:', error);
  }
};

const ensureLoaded = (): void => {
  if (loaded) {
    return;
  }
  loaded = true;
  ensureDataDir();
  loadStoreFromDisk();
};

const persistStore = (): void => {
  ensureDataDir();
  const payload = JSON.stringify(Array.from(jobsById.values()), null, 2);
  fs.writeFileSync(storePath(), payload);
};

const persistSafely = (): void => {
  try {
    persistStore();
  } catch (error) {
    console.error('Failed to persist job store:', error);
  }
};

export const createJob = (): JobRecord => {
  ensureLoaded();

  const job: JobRecord = {
    id: uuidv4(),
    status: 'queued',
    createdAt: new Date().toISOString(),
  };

  jobsById.set(job.id, job);
  persistSafely();

  return job;
};

export const updateJob = (id: string, patch: Partial<Omit<JobRecord, 'id'>>): JobRecord | undefined => {
  ensureLoaded();

  const existing = jobsById.get(id);
  if (!existing) {
    return undefined;
  }

  const updated: JobRecord = {
    ...existing,
    ...patch,
  };

  jobsById.set(id, updated);
  persistSafely();

  return updated;
};

export const getJob = (id: string): JobRecord | undefined => {
  ensureLoaded();
  return jobsById.get(id);
};
