import type { FastifyInstance } from "fastify";

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, qdrantModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/qdrant.js")
      ]);

      const [openai, qdrant] = await Promise.all([openaiModule.getOpenAIClient(), qdrantModule.getQdrantClient()]);

      const [openaiHealth, qdrantHealth] = await Promise.all([openai.healthCheck(), qdrant.healthCheck()]);

      const healthy = openaiHealth.status === "ok" && qdrantHealth.status === "ok";
      reply.code(healthy ? 200 : 503);
      return {
        status: healthy ? "ok" : "degraded",
        clients: {
          openai: openaiHealth,
          qdrant: qdrantHealth
        }
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
