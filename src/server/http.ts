import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import { z } from "zod";
import { ACTION_KINDS } from "../engine/actions";
import { CALLABLE_ROLES, GameRuleError } from "../engine/types";
import type { GameErrorCode } from "../engine/types";
import type { ServerConfig } from "./config";
import type { RoomService } from "./rooms";
import type { RoomStore } from "./store";

const HostBody = z.object({ hostSecret: z.string().min(1) });
const PhaseBody = HostBody.extend({ phase: z.enum(["lobby", "night", "day"]) });
const CallRoleBody = HostBody.extend({ role: z.enum(CALLABLE_ROLES).nullable() });
const StartVotingBody = HostBody.extend({ durationSec: z.number().int().positive().nullish() });
const JoinBody = z.object({ name: z.string().min(1).max(40) });
const ActionBody = z.object({
  playerId: z.string().min(1),
  kind: z.enum(ACTION_KINDS),
  target: z.string().nullish()
});
const SeerBody = z.object({ playerId: z.string().min(1), targetName: z.string().min(1) });
const HostQuery = z.object({ hostSecret: z.string().min(1) });
const ProgressQuery = HostQuery.extend({ role: z.string().min(1) });

const STATUS_BY_CODE: Record<GameErrorCode, number> = {
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  ALREADY_STARTED: 409,
  DUPLICATE_NAME: 409,
  INVALID_PHASE: 400,
  GAME_ENDED: 400,
  DEAD_PLAYER: 400,
  INVALID_ROLE: 400,
  VALIDATION_ERROR: 400
};

/** Validates an untrusted body or query, surfacing failures as VALIDATION_ERROR. */
function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join(".") || "body"}: ${issue.message}`);
    throw new GameRuleError("VALIDATION_ERROR", problems.join("; "));
  }
  return result.data;
}

/** Maps thrown errors to JSON responses. Anything that is not a rule violation is a 500. */
function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof GameRuleError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: { code: err.code, message: err.message } });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: { code: "BAD_JSON", message: "Invalid JSON payload" } });
    return;
  }
  console.error("Unhandled request error", err);
  res.status(500).json({ error: { code: "SERVER_ERROR", message: "Internal error" } });
}

/** Host routes take the host secret in the body (or the query for GETs); player routes take a player id. */
export function createRoomRouter(service: RoomService): express.Router {
  const router = express.Router();

  router.post("/", (_req, res) => {
    res.status(201).json(service.createRoom());
  });

  router.get("/:code/host_state", (req, res) => {
    const { hostSecret } = parse(HostQuery, req.query);
    res.json(service.hostState(req.params.code, hostSecret));
  });

  router.post("/:code/start", (req, res) => {
    const { hostSecret } = parse(HostBody, req.body);
    const room = service.startGame(req.params.code, hostSecret);
    res.json({ ok: true, phase: room.phase, nightNumber: room.nightNumber });
  });

  router.post("/:code/phase", (req, res) => {
    const { hostSecret, phase } = parse(PhaseBody, req.body);
    const room = service.setPhase(req.params.code, hostSecret, phase);
    res.json({ ok: true, phase: room.phase, nightNumber: room.nightNumber, dayNumber: room.dayNumber });
  });

  router.post("/:code/call_role", (req, res) => {
    const { hostSecret, role } = parse(CallRoleBody, req.body);
    const room = service.callRole(req.params.code, hostSecret, role);
    res.json({ ok: true, activeCall: room.activeCall });
  });

  router.post("/:code/resolve_night", (req, res) => {
    const { hostSecret } = parse(HostBody, req.body);
    res.json({ ok: true, ...service.resolveNight(req.params.code, hostSecret) });
  });

  router.post("/:code/start_voting", (req, res) => {
    const { hostSecret, durationSec } = parse(StartVotingBody, req.body);
    const room = service.startVoting(req.params.code, hostSecret, durationSec ?? null);
    res.json({ ok: true, votingStatus: room.votingStatus, voteDurationSec: room.voteDurationSec });
  });

  router.post("/:code/vote_preview", (req, res) => {
    const { hostSecret } = parse(HostBody, req.body);
    res.json(service.votePreview(req.params.code, hostSecret));
  });

  router.post("/:code/resolve_day", (req, res) => {
    const { hostSecret } = parse(HostBody, req.body);
    res.json({ ok: true, ...service.resolveDay(req.params.code, hostSecret) });
  });

  router.get("/:code/role_progress", (req, res) => {
    const { hostSecret, role } = parse(ProgressQuery, req.query);
    res.json(service.roleProgress(req.params.code, hostSecret, role));
  });

  router.post("/:code/join", (req, res) => {
    const { name } = parse(JoinBody, req.body);
    res.status(201).json(service.join(req.params.code, name));
  });

  router.get("/:code/state/:playerId", (req, res) => {
    res.json(service.playerState(req.params.code, req.params.playerId));
  });

  router.post("/:code/actions", (req, res) => {
    const { playerId, kind, target } = parse(ActionBody, req.body);
    service.submitAction(req.params.code, playerId, kind, target);
    res.json({ ok: true });
  });

  router.post("/:code/seer_result", (req, res) => {
    const { playerId, targetName } = parse(SeerBody, req.body);
    res.json(service.seerResult(req.params.code, playerId, targetName));
  });

  router.get("/:code/witch_info/:playerId", (req, res) => {
    res.json(service.witchInfo(req.params.code, req.params.playerId));
  });

  router.get("/:code/village_state", (req, res) => {
    res.json(service.villageState(req.params.code));
  });

  return router;
}

/**
 * Express app exposing the host and player APIs plus a health probe.
 * Live updates are pushed separately over the WebSocket gateway.
 */
export function createHttpApp(service: RoomService, store: RoomStore, config: Pick<ServerConfig, "allowedOrigins">) {
  const app = express();
  app.use(cors({ origin: config.allowedOrigins === "*" ? true : config.allowedOrigins, credentials: true }));
  app.use(express.json());

  /** Health probe for load balancers / ops. Returns process stats only. */
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", rooms: store.list().length, timestamp: Date.now() });
  });

  app.use("/api/rooms", createRoomRouter(service));
  app.use(errorHandler);

  return app;
}
