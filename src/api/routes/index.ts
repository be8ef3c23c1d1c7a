import type { FastifyInstance } from "fastify";
import { registerGenerateRoutes, type GenerateRoutesDependencies } from "./generate.js";
import { registerTemplateRoutes } from "./templates.js";

export interface ApiRoutesDependencies {
  generate?: GenerateRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerGenerateRoutes(app, dependencies?.generate);
  await registerTemplateRoutes(app);
}
