const DEFAULT_FPS_CAP = 60;
const MIN_FRAME_INTERVAL_MS = 1;

function sanitizeFpsCap(fpsCap: number): number {
  if (!Number.isFinite(fpsCap) || fpsCap <= 0) return DEFAULT_FPS_CAP;
  return Math.max(1, Math.floor(fpsCap));
}

/** Whole milliseconds per tick for a frame-rate cap (60 → 16). */
export function computeFrameInterval(fpsCap: number): number {
  return Math.max(MIN_FRAME_INTERVAL_MS, Math.floor(1000 / sanitizeFpsCap(fpsCap)));
}

/** Time left until the tick deadline; never negative. */
export function computeFrameDelay(frameStartMs: number, nowMs: number, intervalMs: number): number {
  const elapsed = nowMs - frameStartMs;
  if (!Number.isFinite(elapsed) || elapsed < 0) return intervalMs;
  return Math.max(0, intervalMs - elapsed);
}
