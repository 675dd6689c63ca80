import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProxmoxApi, RequestParams } from "../proxmox/client.js";
import { describeTask, nodePath } from "../proxmox/resources.js";
import { mapLimit } from "../util/concurrency.js";
import type { Target } from "./selector.js";

export type ContainerAction =
  | { kind: "start" }
  | { kind: "stop" }
  | { kind: "shutdown"; timeoutSeconds: number }
  | { kind: "reboot" };

export type ActionResult =
  | { ok: true; node: string; vmid: number; name: string; message: string | null }
  | { ok: false; node: string; vmid: number; name: string; error: string };

export interface BatchOptions {
  concurrency: number;
  logger: Logger;
}

interface ActionCall {
  command: "start" | "stop" | "shutdown" | "reboot";
  params?: RequestParams;
}

export function actionCall(action: ContainerAction): ActionCall {
  switch (action.kind) {
    case "start":
      return { command: "start" };
    case "stop":
      // forced stop: the backend kills the container immediately
      return { command: "stop" };
    case "shutdown":
      return { command: "shutdown", params: { timeout: action.timeoutSeconds } };
    case "reboot":
      return { command: "reboot" };
    default: {
      const unreachable: never = action;
      return unreachable;
    }
  }
}

/**
 * Send `action` to every target once. Each target succeeds or fails on its
 * own; a failure is recorded in that target's result and never stops the
 * others. Results come back in target order.
 */
export async function runBatch(
  api: ProxmoxApi,
  targets: readonly Target[],
  action: ContainerAction,
  options: BatchOptions
): Promise<ActionResult[]> {
  const { command, params } = actionCall(action);
  options.logger.info({ action: command, targets: targets.length }, "dispatching container action");

  return mapLimit(targets, options.concurrency, async ({ node, vmid, label }): Promise<ActionResult> => {
    try {
      const reply = await api.request("post", `${nodePath(node)}/lxc/${vmid}/status/${command}`, params);
      return { ok: true, node, vmid, name: label, message: describeTask(reply) };
    } catch (error) {
      options.logger.warn({ node, vmid, action: command, err: errorMessage(error) }, "container action failed");
      return { ok: false, node, vmid, name: label, error: errorMessage(error) };
    }
  });
}
