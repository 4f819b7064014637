import type { Logger } from "../logging/logger";
import type { FontLoadResult, ShapeEngine, ShapingFace } from "./types";

/**
 * Process-wide cache of font contexts keyed by (path, size).
 */
export type FontCache = {
  /**
   * Resolve the context for `path` at `size`. Concurrent callers share one
   * pending construction; failures are remembered and returned again.
   */
  acquire(path: string, size: number): Promise<FontLoadResult>;
  /** Number of (path, size) entries, successful or not. */
  readonly size: number;
};

export type FontCacheOptions = {
  engine: ShapeEngine | null;
  logger: Logger;
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function fontCacheKey(path: string, size: number): string {
  return `${path}:${size}`;
}

export function createFontCache(options: FontCacheOptions): FontCache {
  const { engine, logger } = options;
  const faces = new Map<string, Promise<ShapingFace>>();
  const contexts = new Map<string, Promise<FontLoadResult>>();

  const loadFace = (active: ShapeEngine, path: string): Promise<ShapingFace> => {
    let pending = faces.get(path);
    if (!pending) {
      pending = active.loadFace(path);
      faces.set(path, pending);
    }
    return pending;
  };

  const construct = async (key: string, path: string, size: number): Promise<FontLoadResult> => {
    if (!engine) {
      logger.warnOnce("engine-unavailable", "shaping engine unavailable; complex runs degrade");
      return { ok: false, reason: "engine-unavailable", message: "no shaping engine" };
    }
    try {
      const face = await loadFace(engine, path);
      logger.debug("font context ready", { path, size, face: face.label });
      return {
        ok: true,
        context: { key, path, size, face, scale: size / face.unitsPerEm },
      };
    } catch (err) {
      const message = describeError(err);
      logger.warnOnce(`font-load:${path}`, "font load failed; complex runs degrade", {
        path,
        error: message,
      });
      return { ok: false, reason: "font-load-failed", message };
    }
  };

  return {
    acquire(path: string, size: number): Promise<FontLoadResult> {
      if (!Number.isFinite(size) || size <= 0) {
        return Promise.reject(new Error(`font size must be positive, got ${size}`));
      }
      const key = fontCacheKey(path, size);
      const existing = contexts.get(key);
      if (existing) return existing;
      const pending = construct(key, path, size);
      contexts.set(key, pending);
      return pending;
    },
    get size() {
      return contexts.size;
    },
  };
}
