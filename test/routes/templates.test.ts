import Fastify from "fastify";
import { describe, expect, it } from "vitest";
import { registerTemplateRoutes } from "../../src/api/routes/templates.js";

describe("registerTemplateRoutes", () => {
  it("lists templates with sorted placeholders", async () => {
    const app = Fastify();
    try {
      await registerTemplateRoutes(app);

      const response = await app.inject({ method: "GET", url: "/templates" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        templates: [
          {
            name: "article_minimal",
            description: "Plain article with a title block.",
            placeholders: ["AUTHOR", "DATE", "TITLE"]
          },
          {
            name: "assignment",
            description: "Homework hand-in with student and course in the page header.",
            placeholders: ["COURSE", "DATE", "STUDENT_NAME", "TITLE"]
          },
          {
            name: "report",
            description: "Chaptered report with a table of contents.",
            placeholders: ["AUTHOR", "DATE", "TITLE"]
          }
        ]
      });
    } finally {
      await app.close();
    }
  });
});
