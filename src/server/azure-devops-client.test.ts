import { describe, it, expect, vi } from "vitest";
import {
  AzureDevOpsClient,
  LOG_SECTION_SEPARATOR,
  scopeTimelineLogs,
} from "./azure-devops-client.js";
import { AuthError, NotFoundError, toErrorResponse, TransientError } from "./errors.js";
import { parseBuildUrl, parsePipelineUrl, type ReleaseReference } from "./url-parser.js";
import type { TimelineRecord } from "./types/azure-devops.js";

type Route = () => Response;

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function text(body: string, status = 200): Response {
  return new Response(body, { status });
}

function brokenStream(status = 200): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new TypeError("terminated"));
    },
  });
  return new Response(body, { status });
}

function requestUrl(input: Parameters<typeof fetch>[0]): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/** Routes by host + path; unknown routes answer 404. */
function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: Parameters<typeof fetch>[0], _init?: RequestInit) => {
    const url = requestUrl(input);
    const route = routes[`${url.host}${url.pathname}`];
    return route ? route() : text("no such route", 404);
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestedPaths(fetchMock: ReturnType<typeof stubFetch>): string[] {
  return fetchMock.mock.calls.map(([input]) => requestUrl(input).pathname);
}

const BUILD_API = "dev.azure.com/acme/widgets/_apis/build/builds/42";

const build = {
  id: 42,
  buildNumber: "20240101.3",
  status: "completed",
  result: "failed",
  url: "https://dev.azure.com/acme/widgets/_apis/build/builds/42",
  definition: { id: 1, name: "widgets-ci" },
  sourceBranch: "refs/heads/main",
  sourceVersion: "abc123",
  reason: "manual",
};

function createClient() {
  return new AzureDevOpsClient({ pat: "test-pat", apiVersion: "7.1", timeoutMs: 5_000 });
}

describe("AzureDevOpsClient.fetchBuildLogs", () => {
  const ref = parseBuildUrl("https://dev.azure.com/acme/widgets/_build/results?buildId=42");

  it("concatenates every log in log-id order", async () => {
    const fetchMock = stubFetch({
      [BUILD_API]: () => json(build),
      [`${BUILD_API}/logs`]: () =>
        json({
          count: 2,
          value: [
            { id: 2, type: "Container", url: "u2" },
            { id: 1, type: "Container", url: "u1" },
          ],
        }),
      [`${BUILD_API}/logs/1`]: () => text("step one"),
      [`${BUILD_API}/logs/2`]: () => text("ERROR: disk full"),
    });

    const bundle = await createClient().fetchBuildLogs(ref);

    expect(bundle.title).toBe("widgets-ci #20240101.3");
    expect(bundle.status).toBe("completed");
    expect(bundle.result).toBe("failed");
    expect(bundle.sections).toEqual([
      { id: 1, content: "step one" },
      { id: 2, content: "ERROR: disk full" },
    ]);
    expect(bundle.text).toBe(`step one${LOG_SECTION_SEPARATOR}ERROR: disk full`);
    expect(requestedPaths(fetchMock)).toEqual([
      "/acme/widgets/_apis/build/builds/42",
      "/acme/widgets/_apis/build/builds/42/logs",
      "/acme/widgets/_apis/build/builds/42/logs/1",
      "/acme/widgets/_apis/build/builds/42/logs/2",
    ]);
  });

  it("authenticates with the PAT and pins the api version", async () => {
    const fetchMock = stubFetch({ [BUILD_API]: () => json(build) });

    await createClient().getBuild(ref);

    const [input, init] = fetchMock.mock.calls[0];
    expect(requestUrl(input).searchParams.get("api-version")).toBe("7.1");
    expect(init?.headers).toEqual({
      Authorization: `Basic ${Buffer.from(":test-pat").toString("base64")}`,
      Accept: "application/json",
    });
  });

  it("fetches only the linked task's log when the URL names one", async () => {
    const records: Partial<TimelineRecord>[] = [
      { id: "job-1", name: "Build", type: "Job", log: { id: 3, type: "Container", url: "" } },
      { id: "task-1", parentId: "job-1", name: "Restore", type: "Task", log: { id: 4, type: "Container", url: "" } },
      { id: "task-2", parentId: "job-1", name: "Test", type: "Task", log: { id: 5, type: "Container", url: "" } },
    ];
    const fetchMock = stubFetch({
      [BUILD_API]: () => json(build),
      [`${BUILD_API}/timeline`]: () => json({ id: "t", changeId: 1, url: "", records }),
      [`${BUILD_API}/logs/5`]: () => text("1 test failed"),
    });

    const scoped = parseBuildUrl(
      "https://dev.azure.com/acme/widgets/_build/results?buildId=42&view=logs&j=job-1&t=task-2"
    );
    const bundle = await createClient().fetchBuildLogs(scoped);

    expect(bundle.sections).toEqual([{ id: 5, name: "Test", content: "1 test failed" }]);
    expect(requestedPaths(fetchMock)).not.toContain("/acme/widgets/_apis/build/builds/42/logs");
  });

  it("falls back to all logs when the linked record is not in the timeline", async () => {
    stubFetch({
      [BUILD_API]: () => json(build),
      [`${BUILD_API}/timeline`]: () => json({ id: "t", changeId: 1, url: "", records: [] }),
      [`${BUILD_API}/logs`]: () => json({ count: 1, value: [{ id: 1, type: "Container", url: "u1" }] }),
      [`${BUILD_API}/logs/1`]: () => text("whole log"),
    });

    const scoped = parseBuildUrl("https://dev.azure.com/acme/widgets/_build/results?buildId=42&t=gone");
    const bundle = await createClient().fetchBuildLogs(scoped);

    expect(bundle.text).toBe("whole log");
  });

  it.each([401, 403] as const)("maps %d to AuthError", async (status) => {
    stubFetch({ [BUILD_API]: () => text("denied", status) });

    const error = await createClient().fetchBuildLogs(ref).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ statusCode: status });
  });

  it("treats the 203 sign-in page as an AuthError", async () => {
    stubFetch({ [BUILD_API]: () => text("<html>Sign in</html>", 203) });

    await expect(createClient().fetchBuildLogs(ref)).rejects.toBeInstanceOf(AuthError);
  });

  it("maps 404 to NotFoundError", async () => {
    stubFetch({});

    await expect(createClient().fetchBuildLogs(ref)).rejects.toThrow(NotFoundError);
  });

  it("maps 5xx to TransientError carrying the status", async () => {
    stubFetch({ [BUILD_API]: () => text("upstream down", 503) });

    const error = await createClient().fetchBuildLogs(ref).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({
      status: 503,
      message: "Azure DevOps API error 503: upstream down",
    });
  });

  it("reports a body that is not JSON as a malformed response", async () => {
    stubFetch({ [BUILD_API]: () => text("<html>maintenance</html>") });

    const error = await createClient().fetchBuildLogs(ref).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({
      status: 200,
      message: "Azure DevOps returned a malformed response (/acme/widgets/_apis/build/builds/42): body is not JSON",
    });
    expect(toErrorResponse(error).status).toBe(502);
  });

  it("reports a build payload without its definition as a malformed response", async () => {
    const { definition: _definition, ...withoutDefinition } = build;
    stubFetch({ [BUILD_API]: () => json(withoutDefinition) });

    await expect(createClient().fetchBuildLogs(ref)).rejects.toThrow(
      'Azure DevOps returned a malformed response (/acme/widgets/_apis/build/builds/42): Required at "definition"'
    );
  });

  it("reports a log list without entries as a malformed response", async () => {
    stubFetch({
      [BUILD_API]: () => json(build),
      [`${BUILD_API}/logs`]: () => json({ count: 0 }),
    });

    await expect(createClient().fetchBuildLogs(ref)).rejects.toThrow(TransientError);
  });

  it("maps a log download that breaks off to TransientError", async () => {
    stubFetch({
      [BUILD_API]: () => json(build),
      [`${BUILD_API}/logs`]: () => json({ count: 1, value: [{ id: 1, type: "Container", url: "u1" }] }),
      [`${BUILD_API}/logs/1`]: () => brokenStream(),
    });

    const error = await createClient().fetchBuildLogs(ref).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ status: 200 });
    expect(String(error)).toContain(
      "Azure DevOps response could not be read (/acme/widgets/_apis/build/builds/42/logs/1): "
    );
  });

  it("maps an error body that breaks off to TransientError", async () => {
    stubFetch({ [BUILD_API]: () => brokenStream(500) });

    const error = await createClient().fetchBuildLogs(ref).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ status: 500 });
  });

  it("maps network failures to TransientError without retrying", async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError("fetch failed");
    });
    vi.stubGlobal("fetch", fetchMock);

    await expect(createClient().fetchBuildLogs(ref)).rejects.toThrow(TransientError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("AzureDevOpsClient.fetchReleaseLogs", () => {
  it("reads every deployment task log from the release management host", async () => {
    const logBase = "https://vsrm.dev.azure.com/acme/widgets/_apis/Release/releases/7/environments/1/deployPhases/1/tasks";
    const release = {
      id: 7,
      name: "Release-7",
      status: "active",
      environments: [
        {
          id: 1,
          name: "Prod",
          status: "rejected",
          deploySteps: [
            {
              id: 1,
              attempt: 1,
              releaseDeployPhases: [
                {
                  id: 1,
                  name: "Agent job",
                  deploymentJobs: [
                    {
                      tasks: [
                        { id: 1, name: "Initialize", status: "succeeded", logUrl: `${logBase}/1/logs` },
                        { id: 2, name: "Deploy", status: "failed", logUrl: `${logBase}/2/logs` },
                        { id: 3, name: "Notify", status: "skipped" },
                      ],
                    },
                  ],
                },
              ],
            },
          ],
        },
      ],
    };
    const fetchMock = stubFetch({
      "vsrm.dev.azure.com/acme/widgets/_apis/release/releases/7": () => json(release),
      "vsrm.dev.azure.com/acme/widgets/_apis/Release/releases/7/environments/1/deployPhases/1/tasks/1/logs": () =>
        text("init ok"),
      "vsrm.dev.azure.com/acme/widgets/_apis/Release/releases/7/environments/1/deployPhases/1/tasks/2/logs": () =>
        text("##[error] deployment failed"),
    });

    const ref = parsePipelineUrl("https://dev.azure.com/acme/widgets/_releaseProgress?releaseId=7");
    if (ref.kind !== "release") throw new Error("expected a release reference");
    const bundle = await createClient().fetchReleaseLogs(ref satisfies ReleaseReference);

    expect(bundle.title).toBe("Release-7");
    expect(bundle.sections).toEqual([
      { id: 1, name: "Prod / Agent job / Initialize", content: "init ok" },
      { id: 2, name: "Prod / Agent job / Deploy", content: "##[error] deployment failed" },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe("scopeTimelineLogs", () => {
  const records: TimelineRecord[] = [
    { id: "stage", type: "Stage", name: "Build", state: "completed" },
    { id: "job", parentId: "stage", type: "Job", name: "Job", state: "completed", log: { id: 9, type: "Container", url: "" } },
    { id: "a", parentId: "job", type: "Task", name: "A", state: "completed", log: { id: 11, type: "Container", url: "" } },
    { id: "b", parentId: "job", type: "Task", name: "B", state: "completed", log: { id: 10, type: "Container", url: "" } },
    { id: "other", type: "Job", name: "Other", state: "completed", log: { id: 2, type: "Container", url: "" } },
  ];

  it("collects a job and its tasks in log order", () => {
    expect(scopeTimelineLogs(records, "job")).toEqual([
      { id: 9, name: "Job" },
      { id: 10, name: "B" },
      { id: 11, name: "A" },
    ]);
  });

  it("returns a single task", () => {
    expect(scopeTimelineLogs(records, "a")).toEqual([{ id: 11, name: "A" }]);
  });

  it("returns nothing for an unknown record", () => {
    expect(scopeTimelineLogs(records, "missing")).toEqual([]);
  });
});
