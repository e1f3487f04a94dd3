import { pino } from "pino";
import { loadConfig } from "./config.js";
import { buildServer } from "./server.js";

const bootLogger = pino({ name: "submission-control" });

async function main(): Promise<void> {
  const config = loadConfig();
  const app = await buildServer(config);
  await app.listen({ host: config.host, port: config.port });
  app.log.info(
    { endpointUrl: config.submissionEndpointUrl, period: config.throttlePeriod, limit: config.throttleLimit },
    "document submission gateway ready",
  );
}

main().catch((error) => {
  bootLogger.fatal({ err: error }, "submission control failed to start");
  process.exit(1);
});
