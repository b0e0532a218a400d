/**
 * RaycastDebugLogger - Frame capture for debugging hit computation
 *
 * Enable this to record the player and map whenever the ray hits are
 * recomputed. The last capture can be exported as a test setup.
 */

import type { Vector2, Wall } from "@/types";

/**
 * Debug log entry for a single hit recomputation.
 */
export interface RaycastDebugLog {
  timestamp: number;
  position: Vector2;
  headingDegrees: number;
  rayCount: number;
  hitCount: number;
  walls: Wall[];
}

/** Snapshot handed to logFrame by the scene */
export interface RaycastFrame {
  readonly position: Vector2;
  readonly headingDegrees: number;
  readonly rayCount: number;
  readonly hitCount: number;
  readonly walls: readonly Wall[];
}

/**
 * Global debug logger instance.
 */
export class RaycastDebugLoggerImpl {
  private enabled = false;
  private logs: RaycastDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: RaycastDebugLog | null = null;
  private logThrottleMs = 100; // Don't log more than once per 100ms
  private lastLogTime = Number.NEGATIVE_INFINITY;
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log(
      "%c[RAYCAST DEBUG] Logging enabled. Use RaycastDebugLogger.dump() to see logs.",
      "color: #00ff00; font-weight: bold"
    );
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[RAYCAST DEBUG] Logging disabled.");
  }

  /**
   * Toggle debug logging.
   */
  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Capture a recomputed frame.
   */
  logFrame(frame: RaycastFrame): void {
    if (!this.enabled) return;

    const now = this.now();
    if (now - this.lastLogTime < this.logThrottleMs) return;
    this.lastLogTime = now;

    const log: RaycastDebugLog = {
      timestamp: now,
      position: { ...frame.position },
      headingDegrees: frame.headingDegrees,
      rayCount: frame.rayCount,
      hitCount: frame.hitCount,
      walls: frame.walls.map((w) => ({ ...w })),
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `%c[RAYCAST DEBUG] Captured frame #${this.logs.length} - Player: (${frame.position.x.toFixed(1)}, ${frame.position.y.toFixed(1)}), Heading: ${frame.headingDegrees.toFixed(1)}°, Hits: ${frame.hitCount}/${frame.rayCount}`,
      "color: #88ff88"
    );
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log(
      "%c[RAYCAST DEBUG] === FULL LOG DUMP ===",
      "color: #ffff00; font-weight: bold"
    );
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Log @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Position:", log.position);
      console.log("Heading:", log.headingDegrees);
      console.log("Hits:", `${log.hitCount}/${log.rayCount}`);
      console.log("Walls:", log.walls);
      console.groupEnd();
    }
  }

  getLastLog(): RaycastDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly RaycastDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
    this.lastLogTime = Number.NEGATIVE_INFINITY;
    console.log("[RAYCAST DEBUG] Logs cleared.");
  }

  /**
   * Export last log as a test setup (for creating test cases).
   */
  exportAsTestSetup(): string {
    if (!this.lastLog) {
      return "// No log available";
    }

    const log = this.lastLog;
    const wallCode = log.walls
      .map((w) => `    WallUtils.create(${w.x1}, ${w.y1}, ${w.x2}, ${w.y2}),`)
      .join("\n");

    return `/**
 * Captured frame
 * Timestamp: ${new Date(log.timestamp).toISOString()}
 * Hits: ${log.hitCount}/${log.rayCount}
 */
export const capturedSetup = {
  position: { x: ${log.position.x}, y: ${log.position.y} },
  headingDegrees: ${log.headingDegrees},
  walls: [
${wallCode}
  ],
};`;
  }

  /**
   * Print last log as test setup to console.
   */
  exportToConsole(): void {
    console.log(
      "%c[RAYCAST DEBUG] Test Setup Export:",
      "color: #00ff00; font-weight: bold"
    );
    console.log(this.exportAsTestSetup());
  }
}

/**
 * Global debug logger instance.
 */
export const RaycastDebugLogger = new RaycastDebugLoggerImpl();

// Expose to window for easy access from browser console
if (typeof window !== "undefined") {
  (window as unknown as { RaycastDebugLogger: RaycastDebugLoggerImpl }).RaycastDebugLogger =
    RaycastDebugLogger;
}
