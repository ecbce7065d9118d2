import path from "node:path";
import { loadConfig } from "./src/config/env";
import { createSessionDependencies } from "./src/session";
import { buildLawAgent } from "./src/agent/lawAgent";
import { createPool, PgConsultationLog } from "./src/db";
import { createApp, loadApiDocument } from "./src/app";

async function main(): Promise<void> {
  const config = loadConfig();
  const session = createSessionDependencies(config);
  const pool = config.database ? createPool(config.database) : null;
  const consultationLog = pool ? new PgConsultationLog(pool) : null;
  await consultationLog?.init();

  const app = createApp({
    agent: buildLawAgent(config, session),
    consultationLog,
    apiDocument: await loadApiDocument(path.resolve(__dirname, "..", "swagger.json"))
  });

  const server = app.listen(config.port, () => {
    console.log(`Bankruptcy law agent listening on port ${config.port}`);
  });

  const release = async (): Promise<void> => {
    session.close();
    await pool?.end();
  };

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`Received ${signal}, closing the session`);
    server.close(() => {
      release().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Failed to release resources", error);
          process.exit(1);
        }
      );
    });
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

main().catch((error: unknown) => {
  console.error("Failed to start", error);
  process.exit(1);
});
