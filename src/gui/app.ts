import type { IncomingMessage, ServerResponse } from "node:http";
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { isAbsolute, relative, resolve } from "node:path";
import { z } from "zod";
import type { LogAnalyzer } from "../agent/log-analyzer.js";
import type { ProviderCatalog } from "../agent/providers/index.js";
import { PayloadTooLargeError, toErrorResponse, ValidationError } from "../server/errors.js";

export const MAX_BODY_BYTES = 1024 * 1024;

export interface GuiAppOptions {
  analyzer: LogAnalyzer;
  catalog: ProviderCatalog;
  publicDir: string;
}

export const AnalyzeBodySchema = z.object({
  url: z.string().trim().min(1, "must not be empty"),
  query: z.string().optional(),
  provider: z.string().optional(),
  model: z.string().optional(),
});

export type AnalyzeBody = z.infer<typeof AnalyzeBodySchema>;

async function readJsonBody(req: IncomingMessage, maxBytes = MAX_BODY_BYTES): Promise<unknown> {
  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    received += buffer.length;
    // Past the limit the rest is drained, not buffered
    if (received <= maxBytes) chunks.push(buffer);
  }

  if (received > maxBytes) {
    throw new PayloadTooLargeError(`Request body exceeds ${maxBytes} bytes.`);
  }

  const body = Buffer.concat(chunks).toString("utf-8");
  if (!body) return {};
  return JSON.parse(body);
}

function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(data));
}

function getContentType(filePath: string): string {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".html")) return "text/html; charset=utf-8";
  if (lower.endsWith(".css")) return "text/css; charset=utf-8";
  if (lower.endsWith(".js")) return "application/javascript; charset=utf-8";
  if (lower.endsWith(".svg")) return "image/svg+xml";
  if (lower.endsWith(".png")) return "image/png";
  if (lower.endsWith(".ico")) return "image/x-icon";
  return "application/octet-stream";
}

export function parseAnalyzeBody(body: unknown): AnalyzeBody {
  const result = AnalyzeBodySchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(field ? `Invalid "${field}": ${issue.message}` : issue.message);
  }
  return result.data;
}

export function createRequestHandler(options: GuiAppOptions) {
  const { analyzer, catalog, publicDir } = options;
  const htmlPath = resolve(publicDir, "index.html");

  async function tryServeStatic(urlPath: string, res: ServerResponse): Promise<boolean> {
    if (urlPath === "/" || urlPath.startsWith("/api/")) return false;

    let decoded: string;
    try {
      decoded = decodeURIComponent(urlPath);
    } catch {
      sendJson(res, 400, { error: "Bad request" });
      return true;
    }

    const relativePath = decoded.replace(/^\/+/, "");
    const fullPath = resolve(publicDir, relativePath);
    const fromPublic = relative(publicDir, fullPath);

    if (fromPublic.startsWith("..") || isAbsolute(fromPublic)) {
      sendJson(res, 403, { error: "Forbidden" });
      return true;
    }

    if (!fromPublic || !existsSync(fullPath)) return false;

    const content = await readFile(fullPath);
    res.statusCode = 200;
    res.setHeader("Content-Type", getContentType(fullPath));
    res.end(content);
    return true;
  }

  async function handleAnalyze(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendJson(res, error.statusCode, { error: error.message });
      } else {
        sendJson(res, 400, { error: "Invalid JSON body." });
      }
      return;
    }

    try {
      const payload = parseAnalyzeBody(body);
      const result = await analyzer.analyze({
        url: payload.url,
        query: payload.query ?? "",
        provider: payload.provider,
        model: payload.model,
      });
      sendJson(res, 200, result);
    } catch (error) {
      const { status, body: errorBody } = toErrorResponse(error);
      if (status >= 500) {
        console.error(`[gui] Analysis failed (${status}): ${errorBody.error}`);
      }
      sendJson(res, status, errorBody);
    }
  }

  return async function requestHandler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    if (method === "GET") {
      const served = await tryServeStatic(url.pathname, res);
      if (served) return;
    }

    if (method === "GET" && url.pathname === "/") {
      const html = await readFile(htmlPath, "utf-8");
      res.statusCode = 200;
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.end(html);
      return;
    }

    if (method === "GET" && url.pathname === "/api/providers") {
      sendJson(res, 200, catalog);
      return;
    }

    if (method === "GET" && url.pathname === "/api/health") {
      sendJson(res, 200, {
        status: "ok",
        providers: catalog.providers,
        defaultProvider: catalog.defaultProvider,
      });
      return;
    }

    if (method === "POST" && url.pathname === "/api/analyze") {
      await handleAnalyze(req, res);
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  };
}
