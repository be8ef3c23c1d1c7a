import type { FastifyInstance } from "fastify";
import { listTemplates } from "../../modules/latex/templates.js";

export async function registerTemplateRoutes(app: FastifyInstance): Promise<void> {
  app.get("/templates", async () => ({
    templates: listTemplates().map((template) => ({
      name: template.name,
      description: template.description,
      placeholders: [...template.placeholders].sort()
    }))
  }));
}
