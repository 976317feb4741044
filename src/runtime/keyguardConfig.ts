import { isKeyguardState, type KeyguardState } from "../keyguard/types";

type Env = Record<string, string | undefined>;

function parseBool(raw: string | undefined, fallback = false) {
  const v = String(raw ?? "").trim();
  if (!v) return fallback;
  return /^(1|true|yes)$/i.test(v);
}

function parseMs(raw: string | undefined, fallback: number, min: number) {
  const n = Number(raw || fallback);
  return Math.max(min, Number.isFinite(n) ? n : fallback);
}

function parseInitialState(raw: string | undefined): KeyguardState {
  const normalized = String(raw || "OFF").trim().toUpperCase();
  return isKeyguardState(normalized) ? normalized : "OFF";
}

export function resolveKeyguardConfig(env: Env = process.env) {
  return Object.freeze({
    initialState: parseInitialState(env.KEYGUARD_INITIAL_STATE),
    transitionDurationMs: parseMs(env.KEYGUARD_TRANSITION_DURATION_MS, 300, 0),
    toGoneDurationMs: parseMs(env.KEYGUARD_TO_GONE_DURATION_MS, 500, 0),
    toSleepDurationMs: parseMs(env.KEYGUARD_TO_SLEEP_DURATION_MS, 500, 0),
    frameIntervalMs: parseMs(env.KEYGUARD_FRAME_INTERVAL_MS, 16, 1),
    alternateBouncerHiddenGuardMs: parseMs(env.KEYGUARD_ALT_BOUNCER_HIDDEN_GUARD_MS, 200, 0),
    logEnabled: parseBool(env.KEYGUARD_TRANSITION_LOG, false),
    logBufferSize: Math.floor(parseMs(env.KEYGUARD_TRANSITION_LOG_SIZE, 200, 16)),
  });
}

export type KeyguardConfig = ReturnType<typeof resolveKeyguardConfig>;

export const KEYGUARD_CONFIG: KeyguardConfig = resolveKeyguardConfig();
