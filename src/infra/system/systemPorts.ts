import type { SleeperPort } from "../../core/ports/outboundPorts";

/**
 * Real-time pauses for retry spacing and provider rate-limit courtesy.
 */
export class SystemSleeper implements SleeperPort {
  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
