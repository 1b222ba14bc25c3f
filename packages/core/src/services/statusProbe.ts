import {
  describeError,
  logger,
  type ConnectionStatus,
  type Logger,
} from "@mindease/shared";
import { fetchOnce } from "./http.js";

export interface StatusProbeOptions {
  url: string;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * One liveness probe of the dialogue server. A 200 means connected; any
 * other status, a timeout or a network error means disconnected.
 */
export async function probeServerStatus(
  options: StatusProbeOptions,
): Promise<ConnectionStatus> {
  const log = options.logger ?? logger.child({ service: "status-probe" });

  try {
    const status = await fetchOnce(
      options.url,
      { service: "status-probe", timeoutMs: options.timeoutMs },
      async (response) => {
        // Only the status matters; release the connection.
        await response.body?.cancel();
        return response.status;
      },
    );

    if (status === 200) {
      log.info("Dialogue server connection: connected", { url: options.url });
      return "connected";
    }

    log.warn("Dialogue server returned non-200 status", {
      url: options.url,
      status,
    });
    return "disconnected";
  } catch (error) {
    log.error("Dialogue server connection error", {
      url: options.url,
      error: describeError(error),
    });
    return "disconnected";
  }
}
