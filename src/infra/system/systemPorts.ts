import type { DelayPort } from "../../core/ports/outboundPorts";

/**
 * Adapts timer-based waiting so request pacing stays instant in tests.
 */
export class SystemDelay implements DelayPort {
  async wait(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
