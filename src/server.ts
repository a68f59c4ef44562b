// spokehub HTTP surface
// Routes requests for registered groups through version negotiation to a hub-only handler.

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { ConversionRegistry } from "./converter.js";
import {
  RequestAbortedError,
  RequestDecodeError,
  RequestVersionError,
  RuntimeConversionError,
  errorMessage,
} from "./errors.js";
import { HubResourceHandler, type ResourceHandler } from "./handler.js";
import { silentLogger, type Logger } from "./logger.js";
import type { VersionedEnvelope } from "./model.js";
import {
  VersionNegotiator,
  resolveVersion,
  type Dispatch,
  type NegotiationState,
} from "./negotiation.js";
import type { SchemaRegistry } from "./registry.js";
import type { StorageBackend } from "./storage.js";

export interface VersionedServerOptions {
  registry: SchemaRegistry;
  conversions: ConversionRegistry;
  storage: StorageBackend;
  handler?: ResourceHandler;
  logger?: Logger;
  onState?: (state: NegotiationState) => void;
}

interface ResourceRoute {
  group: string;
  plural: string;
  uid?: string;
}

function parseResourceRoute(pathname: string): ResourceRoute | null {
  const segments: string[] = [];
  for (const part of pathname.split("/")) {
    if (part.length === 0) continue;
    try {
      segments.push(decodeURIComponent(part));
    } catch {
      return null;
    }
  }
  if (segments[0] !== "apis" || segments.length < 3 || segments.length > 4) return null;
  const [, group, plural, uid] = segments;
  if (group === undefined || plural === undefined) return null;
  return uid === undefined ? { group, plural } : { group, plural, uid };
}

/**
 * Create a Fetch-style handler serving every group in the registry.
 *
 *   GET    /healthz
 *   GET    /apis
 *   POST   /apis/<group>/<plural>
 *   GET    /apis/<group>/<plural>[/<uid>]
 *   PUT    /apis/<group>/<plural>/<uid>
 *   DELETE /apis/<group>/<plural>/<uid>
 */
export function createVersionedRequestHandler(
  options: VersionedServerOptions
): (request: Request) => Promise<Response> {
  const { registry, conversions } = options;
  const logger = options.logger ?? silentLogger;
  const handler = options.handler ?? new HubResourceHandler(options.storage);
  const negotiatorOptions = options.onState ? { logger, onState: options.onState } : { logger };
  const negotiator = new VersionNegotiator(registry, conversions, negotiatorOptions);

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);

    if (url.pathname === "/healthz") {
      return createJsonResponse(200, { status: "ok" });
    }
    if (url.pathname === "/apis" || url.pathname === "/apis/") {
      if (request.method !== "GET") return createMethodNotAllowedResponse();
      return createJsonResponse(200, { groups: describeGroups(registry) });
    }

    const route = parseResourceRoute(url.pathname);
    if (route === null || !registry.getGroup(route.group)) {
      return createJsonResponse(404, { error: "NotFound", message: "Route not found" });
    }
    const resource = registry.findResourceByPlural(route.group, route.plural);
    if (!resource) {
      return createJsonResponse(404, {
        error: "NotFound",
        message: `Unknown resource '${route.plural}' in group ${route.group}`,
      });
    }
    const kind = resource.kind;
    const { uid } = route;
    // Storage is keyed per group; two groups may declare the same kind.
    const key = `${route.group}/${kind}`;

    try {
      let dispatch: Dispatch;
      let withBody = false;

      if (request.method === "POST" && uid === undefined) {
        withBody = true;
        dispatch = async (hub) => (hub ? handler.create(key, hub) : null);
      } else if (request.method === "GET") {
        dispatch = async () => (uid === undefined ? handler.list(key) : handler.get(key, uid));
      } else if (request.method === "PUT" && uid !== undefined) {
        withBody = true;
        dispatch = async (hub) => (hub ? handler.update(key, uid, hub) : null);
      } else if (request.method === "DELETE" && uid !== undefined) {
        resolveVersion(registry, route.group, { accept: request.headers.get("accept") });
        const deleted = await handler.delete(key, uid);
        return deleted
          ? new Response(null, { status: 204 })
          : createJsonResponse(404, { error: "NotFound", message: `${kind} ${uid} not found` });
      } else {
        return createMethodNotAllowedResponse();
      }

      const negotiated = await negotiator.handle(
        {
          group: route.group,
          kind,
          body: withBody ? await readJsonBody(request) : undefined,
          accept: request.headers.get("accept"),
          signal: request.signal,
        },
        dispatch
      );

      if (negotiated.body === null) {
        return createJsonResponse(404, { error: "NotFound", message: `${kind} ${uid ?? ""} not found` });
      }
      const payload: VersionedEnvelope | { items: VersionedEnvelope[] } = Array.isArray(negotiated.body)
        ? { items: negotiated.body }
        : negotiated.body;
      return createJsonResponse(request.method === "POST" ? 201 : 200, payload, negotiated.apiVersion);
    } catch (err) {
      return errorResponse(err, logger);
    }
  };
}

export function createVersionedNodeServer(options: VersionedServerOptions): Server {
  const handler = createVersionedRequestHandler(options);
  const logger = options.logger ?? silentLogger;

  return createServer((request, response) => {
    serveNode(handler, request, response).catch((err) => {
      logger.error(`unhandled: ${errorMessage(err)}`);
      if (!response.headersSent) response.statusCode = 500;
      response.end();
    });
  });
}

// --- helpers ---

function describeGroups(registry: SchemaRegistry) {
  return registry.listGroups().map((g) => ({
    name: g.name,
    storageVersion: g.storageVersion,
    preferredVersion: g.preferredVersion ?? g.storageVersion,
    versions: g.versions,
    kinds: g.resources.map((r) => r.kind),
  }));
}

async function readJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();
  if (text.trim() === "") throw new RequestDecodeError("request body is empty");
  try {
    return JSON.parse(text);
  } catch {
    throw new RequestDecodeError("request body is not valid JSON");
  }
}

function errorResponse(err: unknown, logger: Logger): Response {
  if (err instanceof RequestVersionError) {
    return createJsonResponse(err.source === "accept" ? 406 : 400, {
      error: "UnsupportedVersion",
      message: err.message,
      requested: err.requested,
      supported: err.supported,
    });
  }
  if (err instanceof RequestDecodeError) {
    return createJsonResponse(400, { error: "BadRequest", message: err.message });
  }
  if (err instanceof RequestAbortedError) {
    return createJsonResponse(499, { error: "ClientClosedRequest", message: err.message });
  }
  if (err instanceof RuntimeConversionError) {
    return createJsonResponse(500, { error: "InternalError", message: "conversion failed" });
  }
  logger.error(errorMessage(err));
  return createJsonResponse(500, { error: "InternalError", message: "internal error" });
}

function createJsonResponse(status: number, payload: unknown, apiVersion?: string): Response {
  const contentType = apiVersion
    ? `application/json; api-version=${apiVersion}`
    : "application/json; charset=utf-8";
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": contentType },
  });
}

function createMethodNotAllowedResponse(): Response {
  return createJsonResponse(405, { error: "MethodNotAllowed", message: "Method not allowed" });
}

async function serveNode(
  handler: (request: Request) => Promise<Response>,
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  const webRequest = await toWebRequest(request);
  const webResponse = await handler(webRequest);
  response.statusCode = webResponse.status;
  webResponse.headers.forEach((value, key) => response.setHeader(key, value));
  response.end(Buffer.from(await webResponse.arrayBuffer()));
}

async function toWebRequest(request: IncomingMessage): Promise<Request> {
  const method = request.method ?? "GET";
  const host = request.headers.host ?? "localhost";
  const url = new URL(request.url ?? "/", `http://${host}`);

  const headers = new Headers();
  for (const [key, value] of Object.entries(request.headers)) {
    if (typeof value === "string") {
      headers.set(key, value);
    } else if (Array.isArray(value)) {
      for (const entry of value) headers.append(key, entry);
    }
  }

  const controller = new AbortController();
  request.once("close", () => {
    if (!request.complete) controller.abort();
  });

  if (method === "GET" || method === "HEAD" || method === "DELETE") {
    return new Request(url, { method, headers, signal: controller.signal });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks), signal: controller.signal });
}
