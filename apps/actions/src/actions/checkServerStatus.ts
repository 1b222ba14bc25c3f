import { slotSet } from "../protocol.js";
import {
  SERVER_CONNECTION_STATUS_SLOT,
  type Action,
  type ActionDependencies,
} from "./types.js";

export function createCheckServerStatusAction(
  deps: ActionDependencies,
): Action {
  return {
    name: "action_check_server_status",
    async run() {
      const status = await deps.probeStatus();
      return [slotSet(SERVER_CONNECTION_STATUS_SLOT, status)];
    },
  };
}
