import { describe, expect, it, vi } from "vitest";
import type { OfficeBridge } from "../src/bridge/api.ts";
import { BridgeCallError, BridgeUnavailableError } from "../src/bridge/errors.ts";
import { InMemoryOfficeBridge } from "../src/bridge/in-memory-bridge.ts";
import { CalcEnvironment, FAILURE_REWARD, SUCCESS_REWARD } from "../src/environment.ts";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function createEnvironment(bridge: OfficeBridge, overrides: { baseFile?: string; goalFile?: string } = {}) {
  return new CalcEnvironment({ bridge, connectAttempts: 3, connectDelayMs: 0, ...overrides });
}

describe("CalcEnvironment", () => {
  it("starts a fresh episode on reset", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge());
    const before = env.state().episode_id;

    const observation = await env.reset();
    expect(observation.success).toBe(true);
    expect(observation.result).toBe("Office environment ready");
    expect(observation.reward).toBe(0);
    expect(observation.current_sheet).toBe("Sheet1");
    expect(observation.sheet_names).toEqual(["Sheet1"]);

    const state = env.state();
    expect(state.step_count).toBe(0);
    expect(state.episode_id).toMatch(UUID_RE);
    expect(state.episode_id).not.toBe(before);
    expect(observation.metadata).toEqual({ episode_id: state.episode_id });
  });

  it("rewards successful and failed steps and stamps step metadata", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge());
    await env.reset();
    const { episode_id } = env.state();

    const ok = await env.step({ command: "set_cell", parameters: { cell: "A1", value: 1 } });
    expect(ok.reward).toBe(SUCCESS_REWARD);
    expect(ok.done).toBe(false);
    expect(ok.metadata).toEqual({ step: 1, command: "set_cell", episode_id });

    const failed = await env.step({ command: "explode", parameters: {} });
    expect(failed.reward).toBe(FAILURE_REWARD);
    expect(failed.metadata).toEqual({ error_code: "unknown_command", step: 2, command: "explode", episode_id });
    expect(env.state().step_count).toBe(2);
  });

  it("fails steps before the first reset", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge());
    const observation = await env.step({ command: "get_cell", parameters: { cell: "A1" } });
    expect(observation.success).toBe(false);
    expect(observation.error_message).toBe("Office bridge is not connected");
    expect(observation.metadata.error_code).toBe("not_connected");
    expect(observation.reward).toBe(-0.1);
  });

  it("resets the step count and discards the previous workbook", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge());
    await env.reset();
    await env.step({ command: "set_cell", parameters: { cell: "A1", value: "old" } });
    await env.step({ command: "add_sheet", parameters: {} });

    const observation = await env.reset();
    expect(env.state().step_count).toBe(0);
    expect(observation.sheet_names).toEqual(["Sheet1"]);
    const cell = await env.step({ command: "get_cell", parameters: { cell: "A1" } });
    expect(cell.data).toBe(0);
  });

  it("opens the base file on reset", async () => {
    const bridge = new InMemoryOfficeBridge();
    bridge.addFile("/data/base.ods", { Inputs: [["seed", 7]] });
    const env = createEnvironment(bridge, { baseFile: "/data/base.ods" });

    const observation = await env.reset();
    expect(observation.current_sheet).toBe("Inputs");
    expect(observation.file_path).toBe("/data/base.ods");
    const cell = await env.step({ command: "get_cell", parameters: { cell: "B1" } });
    expect(cell.data).toBe("7");
  });

  it("stays ready when the base file cannot be opened", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge(), { baseFile: "/data/missing.ods" });
    const observation = await env.reset();
    expect(observation.success).toBe(true);
    expect(observation.file_path).toBeNull();
  });

  it("retries connecting while the office process is unreachable", async () => {
    const bridge = new InMemoryOfficeBridge();
    const connect = vi
      .spyOn(bridge, "connect")
      .mockRejectedValueOnce(new BridgeUnavailableError("connect", "connection refused"))
      .mockRejectedValueOnce(new BridgeUnavailableError("connect", "connection refused"));

    const observation = await createEnvironment(bridge).reset();
    expect(observation.success).toBe(true);
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it("reports a failed initialization after the last attempt", async () => {
    const bridge = new InMemoryOfficeBridge();
    bridge.simulateOutage("connection refused");
    const connect = vi.spyOn(bridge, "connect");

    const observation = await createEnvironment(bridge).reset();
    expect(observation.success).toBe(false);
    expect(observation.result).toBe("Failed to initialize office environment");
    expect(observation.error_message).toBe("connection refused");
    expect(observation.metadata.error_code).toBe("bridge_unavailable");
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it("does not retry office-reported connect failures", async () => {
    const bridge = new InMemoryOfficeBridge();
    const connect = vi.spyOn(bridge, "connect").mockRejectedValue(new BridgeCallError("connect", "access denied"));

    const observation = await createEnvironment(bridge).reset();
    expect(observation.success).toBe(false);
    expect(observation.error_message).toBe("access denied");
    expect(observation.metadata.error_code).toBe("bridge_error");
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it("runs concurrent steps one at a time in call order", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge());
    await env.reset();

    const [first, second, third] = await Promise.all([
      env.step({ command: "set_cell", parameters: { cell: "A1", value: 1 } }),
      env.step({ command: "set_cell", parameters: { cell: "A1", value: 2 } }),
      env.step({ command: "get_cell", parameters: { cell: "A1" } })
    ]);

    expect(first.metadata.step).toBe(1);
    expect(second.metadata.step).toBe(2);
    expect(third.metadata.step).toBe(3);
    expect(third.data).toBe("2");
  });

  it("saves to the goal file on close", async () => {
    const bridge = new InMemoryOfficeBridge();
    const env = createEnvironment(bridge, { goalFile: "/out/goal.ods" });
    await env.reset();
    await env.step({ command: "set_cell", parameters: { cell: "A1", value: 3 } });

    const observation = await env.close();
    expect(observation.success).toBe(true);
    expect(observation.result).toBe("Office environment closed successfully");
    expect(observation.done).toBe(true);
    expect(observation.file_path).toBe("/out/goal.ods");
    expect(bridge.hasFile("/out/goal.ods")).toBe(true);
    expect(bridge.isConnected).toBe(false);
  });

  it("treats closing an unopened environment as a no-op", async () => {
    const env = createEnvironment(new InMemoryOfficeBridge());
    const observation = await env.close();
    expect(observation.success).toBe(true);
    expect(observation.result).toBe("Office environment closed");
  });
});
