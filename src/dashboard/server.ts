import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { z } from "zod";

import { SyncError, toSyncError, type SyncErrorKind } from "../shared/errors.js";
import type { Engine } from "../services/engine.js";
import { getLogger } from "../services/logger.js";

const log = getLogger("dashboard");

export interface DashboardOptions {
  engine: Engine;
  port: number;
  host?: string;
}

const HTTP_STATUS: Record<SyncErrorKind, number> = {
  NotFound: 404,
  LockConflict: 409,
  Busy: 409,
  Unauthorized: 401,
  Precondition: 412,
  ImportError: 422,
  SerializationError: 422,
  NetworkError: 502,
  IoError: 500,
  LaunchError: 500,
};

function sendError(reply: FastifyReply, err: unknown) {
  const e = toSyncError(err);
  reply.code(HTTP_STATUS[e.kind]);
  return { error: e.kind, message: e.message };
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SyncError("Precondition", `${issue?.path.join(".") || "body"}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

const OpenBody = z.object({ launch: z.boolean().default(true) });
const DownloadBody = z.object({ overwrite: z.boolean().default(false) });
const CommitBody = z.object({ message: z.string().min(1).max(1000) });
const ReimportBody = z.object({ makPath: z.string().min(1) });
const LoginBody = z.object({
  token: z.string().optional(),
  email: z.string().optional(),
  password: z.string().optional(),
});
const CreateBody = z.object({
  seed: z.string().max(100).optional(),
  name: z.string().min(1).max(255),
  description: z.string().max(2000).default(""),
  country: z.string().length(2),
  latitude: z.string().optional(),
  longitude: z.string().optional(),
});

type Params = { Params: { id: string } };

export async function createServer(opts: DashboardOptions): Promise<{ app: FastifyInstance; port: number }> {
  const { engine, port } = opts;
  const { manager, state } = engine;

  const app = Fastify({ logger: false });

  // --- State ---

  app.get("/api/state", async () => state.snapshot());

  // One `snapshot` event per state transition. Open streams end when the server closes.
  const streams = new Set<() => void>();

  app.get("/api/events", (req, reply) => {
    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    const send = (data: unknown) => reply.raw.write(`event: snapshot\ndata: ${JSON.stringify(data)}\n\n`);
    send(state.snapshot());
    const unsubscribe = state.subscribe(send);
    const end = () => {
      unsubscribe();
      streams.delete(end);
      if (!reply.raw.writableEnded) reply.raw.end();
    };
    streams.add(end);
    req.raw.on("close", end);
  });

  app.addHook("preClose", async () => {
    for (const end of [...streams]) end();
  });

  // --- Session ---

  app.post("/api/login", async (req, reply) => {
    try {
      await manager.login(parseBody(LoginBody, req.body));
      return state.snapshot();
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/logout", async (_req, reply) => {
    try {
      await manager.logout();
      return state.snapshot();
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post("/api/refresh", async (_req, reply) => {
    try {
      await manager.refreshRemoteList();
      await manager.refreshLocal();
      return state.snapshot();
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // --- Projects ---

  app.post("/api/projects", async (req, reply) => {
    try {
      const { seed, ...metadata } = parseBody(CreateBody, req.body);
      const project = await manager.create(seed, metadata);
      reply.code(201);
      return { project };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /** Every project command answers with the project's entry from the published snapshot. */
  function command(name: string, handler: (id: string, body: unknown) => Promise<unknown>) {
    app.post<Params>(`/api/projects/:id/${name}`, async (req, reply) => {
      try {
        const result = await handler(req.params.id, req.body);
        return { result: result ?? null, project: state.snapshot().projects[req.params.id] ?? null };
      } catch (err) {
        return sendError(reply, err);
      }
    });
  }

  command("open", (id, body) => manager.open(id, parseBody(OpenBody, body)));
  command("download", (id, body) => manager.download(id, parseBody(DownloadBody, body)));
  command("commit", (id, body) => manager.commit(id, parseBody(CommitBody, body).message));
  command("discard", (id) => manager.discard(id));
  command("release", (id) => manager.release(id));
  command("reimport", (id, body) => manager.reimport(id, parseBody(ReimportBody, body).makPath));

  app.setNotFoundHandler(async (_req, reply) => {
    reply.code(404);
    return { error: "NotFound", message: "No such route" };
  });

  return { app, port };
}

export async function startServer(opts: DashboardOptions): Promise<FastifyInstance> {
  const { app, port } = await createServer(opts);

  await app.listen({ port, host: opts.host ?? "127.0.0.1" });
  log.info("Dashboard API listening", { port });
  return app;
}
