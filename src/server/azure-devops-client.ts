import type { z } from "zod";
import type { ServerConfig } from "./config.js";
import { AuthError, NotFoundError, TransientError } from "./errors.js";
import type { BuildReference, PipelineReference, ReleaseReference } from "./url-parser.js";
import {
  BuildLogListSchema,
  BuildSchema,
  ReleaseSchema,
  TimelineSchema,
  type Build,
  type BuildLogListResponse,
  type Release,
  type Timeline,
  type TimelineRecord,
} from "./types/azure-devops.js";

export const LOG_SECTION_SEPARATOR = "\n\n===== LOG SECTION =====\n\n";

const MAX_ERROR_BODY_CHARS = 500;

export interface LogSection {
  id: number;
  name?: string;
  content: string;
}

/** Log text for one build or release, in log-sequence order. Lives for one request. */
export interface LogBundle {
  reference: PipelineReference;
  title: string;
  status?: string;
  result?: string;
  sections: LogSection[];
  text: string;
}

/** What the analyzer needs from Azure DevOps; release support is optional. */
export interface LogSource {
  fetchBuildLogs(ref: BuildReference): Promise<LogBundle>;
  fetchReleaseLogs?(ref: ReleaseReference): Promise<LogBundle>;
}

export function joinLogSections(sections: LogSection[]): string {
  return sections.map((section) => section.content).join(LOG_SECTION_SEPARATOR);
}

/**
 * Log ids owned by the timeline record `rootId` and everything beneath it,
 * so a `t=` link yields one task's log and a `j=` link the whole job.
 */
export function scopeTimelineLogs(
  records: TimelineRecord[],
  rootId: string
): Array<{ id: number; name: string }> {
  const root = records.find((record) => record.id === rootId);
  if (!root) return [];

  const included = new Set<string>([root.id]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const record of records) {
      if (record.parentId && included.has(record.parentId) && !included.has(record.id)) {
        included.add(record.id);
        grew = true;
      }
    }
  }

  const scoped: Array<{ id: number; name: string }> = [];
  for (const record of records) {
    if (included.has(record.id) && record.log) {
      scoped.push({ id: record.log.id, name: record.name });
    }
  }
  return scoped.sort((a, b) => a.id - b.id);
}

function releaseCollectionUrl(ref: ReleaseReference): string {
  const url = new URL(ref.collectionUrl);
  if (url.hostname === "dev.azure.com") {
    url.hostname = "vsrm.dev.azure.com";
  } else if (url.hostname.endsWith(".visualstudio.com") && !url.hostname.includes(".vsrm.")) {
    url.hostname = url.hostname.replace(/\.visualstudio\.com$/, ".vsrm.visualstudio.com");
  }
  return url.toString().replace(/\/$/, "");
}

export class AzureDevOpsClient implements LogSource {
  private authHeader: string;

  constructor(private config: Pick<ServerConfig, "pat" | "apiVersion" | "timeoutMs">) {
    // ":${PAT}" encoded as Base64
    const cred = `:${config.pat}`;
    const encoded = Buffer.from(cred, "utf-8").toString("base64");
    this.authHeader = `Basic ${encoded}`;
  }

  private projectApi(ref: PipelineReference, base = ref.collectionUrl): string {
    return `${base}/${encodeURIComponent(ref.project)}/_apis`;
  }

  private async send(target: string, accept: string, params?: Record<string, string>): Promise<Response> {
    const url = new URL(target);
    if (!url.searchParams.has("api-version")) {
      url.searchParams.set("api-version", this.config.apiVersion);
    }
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, value);
      }
    }

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: {
          Authorization: this.authHeader,
          Accept: accept,
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Azure DevOps request failed (${url.pathname}): ${reason}`);
    }

    // An unauthenticated call is redirected to a sign-in page and answered with 203.
    if (response.status === 203) {
      throw new AuthError("Azure DevOps rejected the personal access token (203 sign-in page)");
    }

    if (!response.ok) {
      const status = response.status;
      if (status === 401 || status === 403) {
        throw new AuthError(`Azure DevOps rejected the personal access token (${status})`, status);
      }
      if (status === 404) {
        throw new NotFoundError(`Azure DevOps resource not found: ${url.pathname}`);
      }
      const body = await this.readBody(response, url);
      throw new TransientError(`Azure DevOps API error ${status}: ${body.slice(0, MAX_ERROR_BODY_CHARS)}`, status);
    }

    return response;
  }

  /** The body stream can still fail (connection reset, timeout) after the headers arrived. */
  private async readBody(response: Response, url: URL): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Azure DevOps response could not be read (${url.pathname}): ${reason}`, response.status);
    }
  }

  private async requestJson<S extends z.ZodTypeAny>(
    target: string,
    schema: S,
    params?: Record<string, string>
  ): Promise<z.output<S>> {
    const response = await this.send(target, "application/json", params);
    const url = new URL(target);
    const body = await this.readBody(response, url);

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new TransientError(`Azure DevOps returned a malformed response (${url.pathname}): body is not JSON`, response.status);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
      throw new TransientError(
        `Azure DevOps returned a malformed response (${url.pathname}): ${issue.message}${where}`,
        response.status
      );
    }
    return parsed.data;
  }

  private async requestText(target: string, params?: Record<string, string>): Promise<string> {
    const response = await this.send(target, "text/plain", params);
    return this.readBody(response, new URL(target));
  }

  // --- Builds ---

  async getBuild(ref: BuildReference): Promise<Build> {
    return this.requestJson(`${this.projectApi(ref)}/build/builds/${ref.buildId}`, BuildSchema);
  }

  async getBuildTimeline(ref: BuildReference): Promise<Timeline> {
    return this.requestJson(`${this.projectApi(ref)}/build/builds/${ref.buildId}/timeline`, TimelineSchema);
  }

  async listBuildLogs(ref: BuildReference): Promise<BuildLogListResponse> {
    return this.requestJson(`${this.projectApi(ref)}/build/builds/${ref.buildId}/logs`, BuildLogListSchema);
  }

  async getBuildLog(ref: BuildReference, logId: number): Promise<string> {
    return this.requestText(`${this.projectApi(ref)}/build/builds/${ref.buildId}/logs/${logId}`);
  }

  private async selectBuildLogs(ref: BuildReference): Promise<Array<{ id: number; name?: string }>> {
    const scopeId = ref.taskId ?? ref.jobId;
    if (scopeId) {
      const timeline = await this.getBuildTimeline(ref);
      const scoped = scopeTimelineLogs(timeline.records, scopeId);
      if (scoped.length > 0) return scoped;
    }

    const logs = await this.listBuildLogs(ref);
    return [...logs.value].sort((a, b) => a.id - b.id).map((log) => ({ id: log.id }));
  }

  async fetchBuildLogs(ref: BuildReference): Promise<LogBundle> {
    const build = await this.getBuild(ref);
    const selected = await this.selectBuildLogs(ref);

    const sections: LogSection[] = [];
    for (const { id, name } of selected) {
      const content = await this.getBuildLog(ref, id);
      sections.push(name ? { id, name, content } : { id, content });
    }

    return {
      reference: ref,
      title: `${build.definition.name} #${build.buildNumber}`,
      status: build.status,
      result: build.result,
      sections,
      text: joinLogSections(sections),
    };
  }

  // --- Releases ---

  async getRelease(ref: ReleaseReference): Promise<Release> {
    const base = this.projectApi(ref, releaseCollectionUrl(ref));
    return this.requestJson(`${base}/release/releases/${ref.releaseId}`, ReleaseSchema);
  }

  async fetchReleaseLogs(ref: ReleaseReference): Promise<LogBundle> {
    const release = await this.getRelease(ref);

    const sections: LogSection[] = [];
    for (const environment of release.environments) {
      for (const step of environment.deploySteps) {
        for (const phase of step.releaseDeployPhases) {
          for (const job of phase.deploymentJobs) {
            for (const task of job.tasks) {
              if (!task.logUrl) continue;
              const content = await this.requestText(task.logUrl);
              sections.push({
                id: task.id,
                name: `${environment.name} / ${phase.name} / ${task.name}`,
                content,
              });
            }
          }
        }
      }
    }

    return {
      reference: ref,
      title: release.name,
      status: release.status,
      sections,
      text: joinLogSections(sections),
    };
  }
}
