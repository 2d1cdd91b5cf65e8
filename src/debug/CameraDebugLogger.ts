/**
 * CameraDebugLogger - Captures camera frames for debugging motor drift and input issues
 *
 * Enable this to capture the camera state while reproducing a bug.
 * The output can be copied and used to create test setups.
 */

import { MotorUtils } from "@/math/Motor";
import type { CameraSnapshot, Vector4 } from "@/types";
import { MOTOR_FIELDS } from "@/types";

/**
 * Debug log entry for a single camera frame.
 */
export interface CameraDebugLog {
  timestamp: number;
  frame: number;
  dt: number;
  /** Camera motor in canonical field order */
  transform: number[];
  magnitudeSquared: number;
  position: Vector4;
  renormalizations: RenormalizationDebugInfo[];
}

export interface RenormalizationDebugInfo {
  reason: "drift" | "interval";
  drift: number;
}

class CameraDebugLoggerImpl {
  private enabled = false;
  private logs: CameraDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: CameraDebugLog | null = null;
  private logThrottleMs = 100; // Don't log more than once per 100ms
  private lastLogTime = 0;
  private frameCounter = 0;
  /** Renormalizations since the last captured frame */
  private pendingRenormalizations: RenormalizationDebugInfo[] = [];

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log(
      "%c[CAMERA DEBUG] Logging enabled. Use CameraDebugLogger.dump() to see logs.",
      "color: #00ff00; font-weight: bold"
    );
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    this.pendingRenormalizations = [];
    console.log("[CAMERA DEBUG] Logging disabled.");
  }

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
   * Log the camera state for the current frame. Throttled.
   */
  logFrame(snapshot: CameraSnapshot, position: Vector4, dt: number, now = Date.now()): void {
    this.frameCounter++;
    if (!this.enabled) return;

    if (now - this.lastLogTime < this.logThrottleMs) return;
    this.lastLogTime = now;

    const magnitudeSquared = MotorUtils.magnitudeSquared(snapshot.transform);
    const log: CameraDebugLog = {
      timestamp: now,
      frame: this.frameCounter,
      dt,
      transform: MotorUtils.toArray(snapshot.transform),
      magnitudeSquared,
      position: [...position],
      renormalizations: this.pendingRenormalizations,
    };
    this.pendingRenormalizations = [];

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `%c[CAMERA DEBUG] Captured frame #${log.frame} - Position: (${position.map((c) => c.toFixed(2)).join(", ")}), |M|²: ${magnitudeSquared.toFixed(9)}`,
      "color: #88ff88"
    );
  }

  /**
   * Record a renormalization; it is attached to the next captured frame,
   * so events during throttled frames are kept until then.
   */
  logRenormalization(reason: "drift" | "interval", drift: number): void {
    if (!this.enabled) return;

    this.pendingRenormalizations.push({ reason, drift });
    if (reason === "drift") {
      console.warn(`[CAMERA DEBUG] Motor drift ${drift.toExponential(2)} - renormalized`);
    }
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("%c[CAMERA DEBUG] Dumping logs...", "color: #00ff00; font-weight: bold");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Frame #${log.frame} @ ${new Date(log.timestamp).toISOString()}`);
      console.log("dt:", log.dt);
      console.log("Position:", log.position);
      console.log("Transform:", log.transform);
      console.log("|M|²:", log.magnitudeSquared);
      if (log.renormalizations.length > 0) {
        console.log("Renormalizations:", log.renormalizations);
      }
      console.groupEnd();
    }
  }

  getLastLog(): CameraDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly CameraDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs and the throttle window.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
    this.lastLogTime = 0;
    this.frameCounter = 0;
    this.pendingRenormalizations = [];
    console.log("[CAMERA DEBUG] Logs cleared.");
  }

  /**
   * Export last log as a test setup (for creating test cases).
   */
  exportAsTestSetup(): string {
    if (!this.lastLog) {
      return "// No log available";
    }

    const log = this.lastLog;
    const fields = MOTOR_FIELDS.map((field, i) => `    ${field}: ${log.transform[i]},`).join("\n");

    return `/**
 * Generated test setup from camera debug log
 * Frame: ${log.frame}, |M|²: ${log.magnitudeSquared}
 */
it("reproduces frame #${log.frame}", () => {
  const camera = MotorUtils.create({
${fields}
  });
  const position = MotorUtils.transformPoint(camera, [0, 0, 0, 0]);
  expect(position[0]).toBeCloseTo(${log.position[0]});
  expect(position[1]).toBeCloseTo(${log.position[1]});
  expect(position[2]).toBeCloseTo(${log.position[2]});
  expect(position[3]).toBeCloseTo(${log.position[3]});
});`;
  }

  /**
   * Print last log as test setup to console.
   */
  exportToConsole(): void {
    console.log("%c[CAMERA DEBUG] Test Setup Export:", "color: #00ff00; font-weight: bold");
    console.log(this.exportAsTestSetup());
  }
}

/**
 * Global debug logger instance.
 */
export const CameraDebugLogger = new CameraDebugLoggerImpl();
