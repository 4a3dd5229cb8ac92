import { z } from "zod";

// Only the fields the client reads are required; Azure DevOps sends many more.

// Build / Pipeline Run types
export const BuildSchema = z.object({
  id: z.number(),
  buildNumber: z.string(),
  status: z.string().optional(),
  result: z.string().optional(),
  queueTime: z.string().optional(),
  startTime: z.string().optional(),
  finishTime: z.string().optional(),
  definition: z.object({
    id: z.number().optional(),
    name: z.string(),
  }),
  sourceBranch: z.string().optional(),
  sourceVersion: z.string().optional(),
});

export type Build = z.infer<typeof BuildSchema>;

// Timeline types (stages, jobs, tasks)
export const TimelineRecordSchema = z.object({
  id: z.string(),
  parentId: z.string().nullish(),
  type: z.string(),
  name: z.string(),
  state: z.string().nullish(),
  result: z.string().nullish(),
  log: z
    .object({
      id: z.number(),
      type: z.string().optional(),
      url: z.string().optional(),
    })
    .nullish(),
  order: z.number().nullish(),
});

export type TimelineRecord = z.infer<typeof TimelineRecordSchema>;

export const TimelineSchema = z.object({
  id: z.string().optional(),
  records: z.array(TimelineRecordSchema).default([]),
});

export type Timeline = z.infer<typeof TimelineSchema>;

// Build Log types
export const BuildLogEntrySchema = z.object({
  id: z.number(),
  type: z.string().optional(),
  url: z.string().optional(),
  lineCount: z.number().optional(),
});

export const BuildLogListSchema = z.object({
  count: z.number().optional(),
  value: z.array(BuildLogEntrySchema),
});

export type BuildLogListResponse = z.infer<typeof BuildLogListSchema>;

// Release types (classic release pipelines, served from vsrm.*)
export const ReleaseTaskSchema = z.object({
  id: z.number(),
  name: z.string(),
  status: z.string().optional(),
  logUrl: z.string().nullish(),
});

export const ReleaseDeployPhaseSchema = z.object({
  id: z.number().optional(),
  name: z.string(),
  deploymentJobs: z
    .array(
      z.object({
        tasks: z.array(ReleaseTaskSchema).default([]),
      })
    )
    .default([]),
});

export const ReleaseEnvironmentSchema = z.object({
  id: z.number(),
  name: z.string(),
  status: z.string().optional(),
  deploySteps: z
    .array(
      z.object({
        id: z.number().optional(),
        attempt: z.number().optional(),
        releaseDeployPhases: z.array(ReleaseDeployPhaseSchema).default([]),
      })
    )
    .default([]),
});

export const ReleaseSchema = z.object({
  id: z.number(),
  name: z.string(),
  status: z.string().optional(),
  environments: z.array(ReleaseEnvironmentSchema).default([]),
});

export type Release = z.infer<typeof ReleaseSchema>;
