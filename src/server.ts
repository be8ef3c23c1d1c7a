import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { runStartupChecks } from "./startup/startup-checks.js";

export async function bootstrap(): Promise<void> {
  await runStartupChecks();

  const app = await buildApp();
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error) => {
    console.error("Startup checks failed", error);
    process.exitCode = 1;
  });
}
