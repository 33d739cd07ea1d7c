import { COMMAND_NAMES, COMMAND_REGISTRY, isCommandName, type Observation } from "@calc-env/core";
import type { FastifyInstance } from "fastify";
import { z } from "zod";

const ActionBodySchema = z.object({
  command: z.string().min(1),
  parameters: z.unknown().optional()
});

// `{ action: { command, parameters } }`, or the action itself.
const StepBodySchema = z.union([z.object({ action: ActionBodySchema }), ActionBodySchema]);

function toStepResponse(observation: Observation) {
  return { observation, reward: observation.reward, done: observation.done };
}

export function registerEnvRoutes(app: FastifyInstance): void {
  app.post("/reset", async (request) => {
    const observation = await app.environment.reset();
    if (!observation.success) {
      request.log.error({ error: observation.error_message }, "env_reset_failed");
    }
    return toStepResponse(observation);
  });

  app.post("/step", async (request, reply) => {
    const parsed = StepBodySchema.safeParse(request.body);
    if (!parsed.success) return reply.code(400).send({ error: "invalid_request" });

    const action = "action" in parsed.data ? parsed.data.action : parsed.data;
    const observation = await app.environment.step(action);

    app.metrics.envStepsTotal.inc({
      command: isCommandName(action.command) ? action.command : "unknown",
      status: observation.success ? "success" : "failure"
    });
    if (!observation.success) {
      request.log.warn(
        { command: action.command, errorCode: observation.metadata.error_code },
        "env_step_failed"
      );
    }

    return toStepResponse(observation);
  });

  app.get("/state", async () => app.environment.state());

  app.get("/commands", async () => ({
    commands: COMMAND_NAMES.map((name) => ({ name, description: COMMAND_REGISTRY[name].description }))
  }));
}
