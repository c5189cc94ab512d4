import { z } from "zod";
import type { GameOptions } from "../engine/types";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  /** Comma-separated list, or "*" to reflect any origin. */
  ALLOWED_ORIGINS: z.string().default("*"),
  MIN_PLAYERS: z.coerce.number().int().min(4).default(4),
  GAMBLER_FROM_NIGHT: z.coerce.number().int().min(1).default(2)
});

export interface ServerConfig {
  port: number;
  allowedOrigins: string[] | "*";
  game: GameOptions;
}

/**
 * Validates the process environment (after dotenv has populated it).
 * Throws with every offending variable listed when something is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const { PORT, ALLOWED_ORIGINS, MIN_PLAYERS, GAMBLER_FROM_NIGHT } = parsed.data;
  const origins = ALLOWED_ORIGINS.split(",")
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return {
    port: PORT,
    allowedOrigins: origins.length === 0 || origins.includes("*") ? "*" : origins,
    game: { minPlayers: MIN_PLAYERS, gamblerFromNight: GAMBLER_FROM_NIGHT }
  };
}
