import { serve } from "@hono/node-server";
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { config } from "./config";
import { errorMessage, httpStatusFor, InvalidRequestError } from "./errors";
import { createLogger } from "./logger";
import {
  adjudicatePharmacyClaim,
  checkFormulary,
  createRxMember,
  evaluatePriorAuth,
  exportX12,
  generateMembers,
  generatePatients,
  getRxMember,
  listPlans,
  listScenarios,
  saveSession,
  screenDur,
} from "./operations";
import { createPharmacySession, type PharmacySessionInstance } from "./session";
import { createOutputStore, type OutputStore } from "./storage";

const log = createLogger("server");

export interface AppDependencies {
  session?: PharmacySessionInstance;
  store?: OutputStore;
  /** Per-request access logging through hono/logger. */
  requestLogging?: boolean;
}

async function readBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === "") return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidRequestError("Invalid JSON body");
  }
}

export function createApp(deps: AppDependencies = {}) {
  const session = deps.session ?? createPharmacySession();
  const store = deps.store ?? createOutputStore();
  const app = new Hono();

  app.use("*", cors());
  if (deps.requestLogging ?? true) app.use("*", logger((message) => log.info(message)));

  app.get("/api/health", (c) =>
    c.json({
      status: "ok",
      session: session.id,
      members: session.members.size,
      claims: session.claims.length,
      timestamp: new Date().toISOString(),
    }),
  );

  app.get("/api/scenarios", (c) => c.json(listScenarios()));

  app.get("/api/plans", (c) => c.json(listPlans()));

  app.post("/api/patients/generate", async (c) => {
    const result = generatePatients(await readBody(c));
    if (result.format === "hl7") {
      return c.text(result.messages.join("\n"), 200, { "content-type": "application/hl7-v2; charset=utf-8" });
    }
    if (result.format === "fhir") return c.json(result.bundle, 200, { "content-type": "application/fhir+json" });
    return c.json(result);
  });

  app.post("/api/members/generate", async (c) => c.json(generateMembers(await readBody(c))));

  app.post("/api/x12/:transaction", async (c) => {
    const { content } = exportX12(c.req.param("transaction"), await readBody(c));
    return c.text(content, 200, { "content-type": "application/edi-x12" });
  });

  app.get("/api/formulary/:ndc", (c) => c.json(checkFormulary(c.req.param("ndc"), c.req.query(), session)));

  app.post("/api/dur/screen", async (c) => c.json(screenDur(await readBody(c), session)));

  app.post("/api/pa/evaluate", async (c) => c.json(evaluatePriorAuth(session, await readBody(c))));

  app.post("/api/rx/members", async (c) => c.json(createRxMember(session, await readBody(c)), 201));

  app.get("/api/rx/members/:id", (c) => {
    const member = getRxMember(session, c.req.param("id"));
    return c.json({ ...member, claims: session.claimsFor(member.memberId) });
  });

  app.post("/api/rx/claims", async (c) => c.json(adjudicatePharmacyClaim(session, await readBody(c))));

  app.post("/api/session/save", async (c) => c.json(await saveSession(session, store)));

  app.notFound((c) => c.json({ error: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.onError((err, c) => {
    const status = httpStatusFor(err);
    if (status === 500) log.error(`${c.req.method} ${c.req.path} failed: ${err.stack ?? err.message}`);
    return c.json({ error: errorMessage(err) }, status);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;

export function startServer(deps: AppDependencies = {}, port = config.PORT) {
  const app = createApp(deps);
  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info(`HealthSim API listening on http://localhost:${info.port}`);
  });
  return { app, server };
}
