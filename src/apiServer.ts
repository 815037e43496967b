import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { z, ZodError } from "zod";
import { requireBearer, type AuthOptions } from "./auth.js";
import type { DeliveryMessage, Subscription } from "./deliveryRouter.js";
import {
  DuplicateInFlightError,
  GateDeniedError,
  VersionConflictError,
  isWorkflowError,
  toErrorString,
  type WorkflowError,
  type WorkflowErrorCode,
} from "./errors.js";
import { BodyParseError, getPathname, readJsonBody, sendJson, sseFrame } from "./http.js";
import { childLogger } from "./logger.js";
import type { ResearchWorkflow } from "./researchWorkflow.js";

const log = childLogger({ component: "api_server" });

const STATUS_BY_CODE: Record<WorkflowErrorCode, number> = {
  version_conflict: 409,
  gate_denied: 422,
  duplicate_in_flight: 409,
  task_type_unknown: 400,
  stale_result: 409,
  unknown_request: 404,
  not_found: 404,
  question_locked: 409,
  session_closed: 409,
  invalid_mutation: 400,
  unavailable: 503,
};

const startSessionBody = z.object({
  sessionId: z.string().trim().min(1).max(200).optional(),
  questionText: z.string().optional(),
});

const transitionBody = z.object({
  targetPhase: z.string().min(1),
  expectedVersion: z.number().int().positive(),
});

const editBody = z.object({
  expectedVersion: z.number().int().positive(),
  mutation: z.unknown(),
});

const taskBody = z.object({
  taskType: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
  idempotencyKey: z.string().min(1).max(200).optional(),
  lane: z.enum(["default", "stream"]).optional(),
});

function errorBody(e: WorkflowError): Record<string, unknown> {
  const body: Record<string, unknown> = { error: e.code, message: e.message };
  if (e instanceof GateDeniedError) body.reasons = e.reasons;
  if (e instanceof VersionConflictError) body.currentVersion = e.currentVersion;
  if (e instanceof DuplicateInFlightError) body.inFlightKey = e.inFlightKey;
  return body;
}

export function sendError(res: ServerResponse, e: unknown): void {
  if (isWorkflowError(e)) {
    sendJson(res, STATUS_BY_CODE[e.code], errorBody(e));
    return;
  }
  if (e instanceof BodyParseError) {
    sendJson(res, e.status, { error: "invalid_request", message: e.message });
    return;
  }
  if (e instanceof ZodError) {
    const issue = e.issues[0];
    sendJson(res, 400, {
      error: "invalid_request",
      message: issue ? `${issue.path.join(".") || "(body)"}: ${issue.message}` : "invalid request body",
    });
    return;
  }
  log.error("unhandled request error", { error: toErrorString(e) });
  sendJson(res, 500, { error: "internal", message: "internal server error" });
}

export interface ApiServerOptions {
  auth: AuthOptions;
  /** Throws when a dependency (database) is unreachable. */
  healthCheck?: () => Promise<void>;
  keepaliveMs?: number;
}

function streamEvents(
  req: IncomingMessage,
  res: ServerResponse,
  sub: Subscription,
  keepaliveMs: number,
): void {
  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
    "X-Accel-Buffering": "no",
  });
  res.flushHeaders?.();
  res.socket?.setNoDelay(true);

  const keepalive = setInterval(() => {
    if (!res.writableEnded) res.write(": keepalive\n\n");
  }, keepaliveMs);

  const write = (msg: DeliveryMessage): void => {
    if (res.writableEnded) return;
    if (msg.channel === "state") res.write(sseFrame("state", msg, msg.version));
    else res.write(sseFrame("stream", msg));
  };
  const pump = async (queue: AsyncIterable<DeliveryMessage>): Promise<void> => {
    for await (const msg of queue) write(msg);
  };

  req.on("close", () => {
    clearInterval(keepalive);
    sub.close();
  });
  void Promise.all([pump(sub.state), pump(sub.stream)])
    .catch((e: unknown) => log.error("event stream failed", { session_id: sub.sessionId, error: toErrorString(e) }))
    .finally(() => {
      clearInterval(keepalive);
      if (!res.writableEnded) res.end();
    });
}

/** REST + Server-Sent Events over the research workflow. */
export function createApiServer(workflow: ResearchWorkflow, opts: ApiServerOptions): Server {
  const keepaliveMs = opts.keepaliveMs ?? 25000;

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const pathname = getPathname(req.url ?? "/");

    if (method === "GET" && pathname === "/health") {
      try {
        await opts.healthCheck?.();
        sendJson(res, 200, { status: "ok" });
      } catch (e) {
        sendJson(res, 503, { status: "unhealthy", error: toErrorString(e) });
      }
      return;
    }

    if (!requireBearer(req, res, opts.auth)) return;

    if (method === "POST" && pathname === "/sessions") {
      const body = startSessionBody.parse(await readJsonBody(req));
      sendJson(res, 201, await workflow.startSession(body));
      return;
    }

    const session = pathname.match(/^\/sessions\/([^/]+)(?:\/(transitions|edits|tasks|events))?$/);
    if (session) {
      const sessionId = decodeURIComponent(session[1]);
      const sub = session[2];
      if (method === "GET" && sub === undefined) {
        sendJson(res, 200, await workflow.getSession(sessionId));
        return;
      }
      if (method === "POST" && sub === "transitions") {
        const body = transitionBody.parse(await readJsonBody(req));
        sendJson(res, 200, await workflow.requestTransition(sessionId, body.targetPhase, body.expectedVersion));
        return;
      }
      if (method === "POST" && sub === "edits") {
        const body = editBody.parse(await readJsonBody(req));
        sendJson(res, 200, await workflow.applyEdit(sessionId, body.expectedVersion, body.mutation));
        return;
      }
      if (method === "POST" && sub === "tasks") {
        const body = taskBody.parse(await readJsonBody(req));
        const accepted = await workflow.submitAgentTask(sessionId, body.taskType, body.payload, {
          idempotencyKey: body.idempotencyKey,
          lane: body.lane,
        });
        sendJson(res, 202, { ...accepted });
        return;
      }
      if (method === "GET" && sub === "events") {
        streamEvents(req, res, await workflow.subscribe(sessionId), keepaliveMs);
        return;
      }
    }

    const task = pathname.match(/^\/tasks\/([^/]+)$/);
    if (task) {
      const key = decodeURIComponent(task[1]);
      if (method === "GET") {
        sendJson(res, 200, { idempotencyKey: key, status: await workflow.getTaskStatus(key) });
        return;
      }
      if (method === "DELETE") {
        await workflow.cancelTask(key);
        sendJson(res, 200, { idempotencyKey: key, cancelled: true });
        return;
      }
    }

    sendJson(res, 404, { error: "not_found", message: `no route for ${method} ${pathname}` });
  };

  return createServer((req, res) => {
    handle(req, res).catch((e: unknown) => {
      if (res.headersSent) {
        log.error("request failed after headers were sent", { error: toErrorString(e) });
        res.end();
        return;
      }
      sendError(res, e);
    });
  });
}
