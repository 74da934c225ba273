import type { BotDifficulty, RandomSource } from "./types.js";

export interface BotProfile {
  /** Seconds per 500m. */
  paceSeconds: number;
  paceVariance: number;
  watts: number;
  wattsVariance: number;
  speedMetersPerSecond: number;
}

export const BOT_PROFILES: Readonly<Record<BotDifficulty, BotProfile>> = {
  easy: { paceSeconds: 150, paceVariance: 10, watts: 120, wattsVariance: 20, speedMetersPerSecond: 3.3 },
  medium: { paceSeconds: 120, paceVariance: 8, watts: 180, wattsVariance: 25, speedMetersPerSecond: 4.2 },
  hard: { paceSeconds: 100, paceVariance: 5, watts: 250, wattsVariance: 30, speedMetersPerSecond: 5.0 },
  elite: { paceSeconds: 90, paceVariance: 3, watts: 320, wattsVariance: 35, speedMetersPerSecond: 5.6 }
};

export const SPEED_JITTER = 0.2;

export interface BotProgress {
  distance: number;
  pace: number;
  watts: number;
}

export interface BotState {
  distance: number;
  botDifficulty: BotDifficulty | null;
}

export function getBotProfile(difficulty: BotDifficulty | null): BotProfile {
  return BOT_PROFILES[difficulty ?? "medium"];
}

/**
 * Progress a bot to `elapsedSeconds` after the start. Speed, pace and watts are
 * jittered independently; distance never goes backwards and never passes
 * `targetDistance`.
 */
export function advanceBot(
  bot: BotState,
  targetDistance: number,
  elapsedSeconds: number,
  random: RandomSource
): BotProgress {
  const profile = getBotProfile(bot.botDifficulty);
  const jitter = (random() - 0.5) * SPEED_JITTER;
  const speed = profile.speedMetersPerSecond * (1 + jitter);

  const candidate = Math.min(Math.max(0, elapsedSeconds) * speed, targetDistance);
  const distance = Math.min(Math.max(bot.distance, candidate), targetDistance);
  const pace = profile.paceSeconds + (random() - 0.5) * profile.paceVariance;
  const watts = Math.round(profile.watts + (random() - 0.5) * profile.wattsVariance);

  return { distance, pace, watts };
}
