import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<unknown> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const [openaiModule, qdrantModule] = await Promise.all([
    import("./openai.js"),
    import("./qdrant.js")
  ]);

  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient,
    getQdrantClient: qdrantModule.getQdrantClient,
    shutdownQdrantClient: qdrantModule.shutdownQdrantClient
  };
}

async function shutdownAllClients(logPrefix: string, loadClientModules: () => Promise<ClientLifecycleModules>): Promise<void> {
  const clients = await loadClientModules();
  console.info(`${logPrefix} shutting down infrastructure clients`);
  await Promise.allSettled([clients.shutdownQdrantClient(), clients.shutdownOpenAIClient()]);
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => void;
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? config.ENABLE_INFRA_BOOTSTRAP;
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClientModules = options?.loadClientModules ?? getClientModules;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const clients = await loadClientModules();
    await Promise.all([
      clients.getOpenAIClient().then((client) => client.healthCheck()),
      clients.getQdrantClient().then((client) => client.healthCheck())
    ]);
    app.log.info("Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownAllClients("[lifecycle/onClose]", loadClientModules);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      console.info(`[lifecycle/process] received ${signal}`);
      await shutdownAllClients("[lifecycle/process]", loadClientModules);
      exit(0);
    };

    const onSignal = (signal: NodeJS.Signals) => () => {
      handleSignal(signal).catch((error: unknown) => {
        console.error(`[lifecycle/process] shutdown after ${signal} failed`, error);
        exit(1);
      });
    };

    process.once("SIGINT", onSignal("SIGINT"));
    process.once("SIGTERM", onSignal("SIGTERM"));
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
