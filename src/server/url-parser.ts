import { ParseError } from "./errors.js";

export interface BuildReference {
  readonly kind: "build";
  readonly organization: string;
  readonly project: string;
  readonly buildId: number;
  /** API root that precedes `/{project}/_apis`, e.g. `https://dev.azure.com/acme`. */
  readonly collectionUrl: string;
  /** Timeline record ids from the `j=` and `t=` query parameters of a log view. */
  readonly jobId?: string;
  readonly taskId?: string;
}

export interface ReleaseReference {
  readonly kind: "release";
  readonly organization: string;
  readonly project: string;
  readonly releaseId: number;
  readonly collectionUrl: string;
}

export type PipelineReference = BuildReference | ReleaseReference;

interface UrlLocation {
  organization: string;
  project: string;
  collectionUrl: string;
  area: string | undefined;
  params: URLSearchParams;
}

const VISUALSTUDIO_SUFFIX = ".visualstudio.com";
const RELEASE_AREAS = new Set(["_release", "_releaseprogress"]);
const NUMERIC_ID = /^\d+$/;

/**
 * Cleans up a URL the way users paste it: surrounding whitespace, a chat-style
 * leading `@`, and a missing scheme.
 */
export function normalizeInputUrl(raw: string): string {
  let url = raw.trim();
  if (url.startsWith("@")) {
    url = url.slice(1).trim();
  }
  if (url && !/^https?:\/\//i.test(url)) {
    url = `https://${url}`;
  }
  return url;
}

function decodeSegment(segment: string, url: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ParseError(`Malformed path segment "${segment}" in URL: ${url}`);
  }
}

function joinPath(origin: string, segments: string[]): string {
  return [origin, ...segments.map((s) => encodeURIComponent(s))].join("/");
}

function locate(url: string): UrlLocation {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ParseError(`Not a valid URL: ${url}`);
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ParseError(`Unsupported URL scheme "${parsed.protocol}" in: ${url}`);
  }

  const segments = parsed.pathname
    .split("/")
    .filter(Boolean)
    .map((segment) => decodeSegment(segment, url));
  const host = parsed.hostname.toLowerCase();

  let organization: string | undefined;
  let project: string | undefined;
  let collectionUrl: string;
  let rest: string[];

  if (host === "dev.azure.com") {
    // https://dev.azure.com/{org}/{project}/...
    [organization, project] = segments;
    collectionUrl = joinPath(parsed.origin, segments.slice(0, 1));
    rest = segments.slice(2);
  } else if (host.endsWith(VISUALSTUDIO_SUFFIX) && host.length > VISUALSTUDIO_SUFFIX.length) {
    // https://{org}.visualstudio.com[/DefaultCollection]/{project}/...
    organization = host.slice(0, -VISUALSTUDIO_SUFFIX.length);
    const offset = segments[0]?.toLowerCase() === "defaultcollection" ? 1 : 0;
    project = segments[offset];
    collectionUrl = joinPath(parsed.origin, segments.slice(0, offset));
    rest = segments.slice(offset + 1);
  } else {
    // On-prem server: https://{host}/tfs/{collection}/{project}/...
    const tfsIndex = segments.findIndex((s) => s.toLowerCase() === "tfs");
    if (tfsIndex < 0) {
      throw new ParseError(`Not a recognized Azure DevOps URL: ${url}`);
    }
    organization = segments[tfsIndex + 1];
    project = segments[tfsIndex + 2];
    collectionUrl = joinPath(parsed.origin, segments.slice(0, tfsIndex + 2));
    rest = segments.slice(tfsIndex + 3);
  }

  if (!organization || !project || organization.startsWith("_") || project.startsWith("_")) {
    throw new ParseError(`Could not find organization and project in URL: ${url}`);
  }

  return {
    organization,
    project,
    collectionUrl,
    area: rest[0]?.toLowerCase(),
    params: parsed.searchParams,
  };
}

function parseId(raw: string | null, name: string, url: string): number {
  if (raw === null || raw === "") {
    throw new ParseError(`Missing ${name} in URL: ${url}`);
  }
  const value = Number(raw);
  if (!NUMERIC_ID.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ParseError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function toBuildReference(location: UrlLocation, url: string): BuildReference {
  const buildId = parseId(location.params.get("buildId"), "buildId", url);
  const jobId = location.params.get("j") || undefined;
  const taskId = location.params.get("t") || undefined;

  return Object.freeze({
    kind: "build" as const,
    organization: location.organization,
    project: location.project,
    buildId,
    collectionUrl: location.collectionUrl,
    ...(jobId ? { jobId } : {}),
    ...(taskId ? { taskId } : {}),
  });
}

/** Extracts organization, project and build id from an Azure DevOps build results URL. */
export function parseBuildUrl(url: string): BuildReference {
  const location = locate(url);
  if (location.area !== "_build") {
    throw new ParseError(`Not an Azure DevOps build URL: ${url}`);
  }
  return toBuildReference(location, url);
}

/** Like {@link parseBuildUrl}, but release pipeline URLs are recognized as well. */
export function parsePipelineUrl(url: string): PipelineReference {
  const location = locate(url);

  if (location.area === "_build") {
    return toBuildReference(location, url);
  }

  if (location.area && RELEASE_AREAS.has(location.area)) {
    return Object.freeze({
      kind: "release" as const,
      organization: location.organization,
      project: location.project,
      releaseId: parseId(location.params.get("releaseId"), "releaseId", url),
      collectionUrl: location.collectionUrl,
    });
  }

  throw new ParseError(`Not an Azure DevOps build or release URL: ${url}`);
}

export function describeReference(ref: PipelineReference): string {
  return ref.kind === "build"
    ? `build ${ref.buildId} in ${ref.organization}/${ref.project}`
    : `release ${ref.releaseId} in ${ref.organization}/${ref.project}`;
}
