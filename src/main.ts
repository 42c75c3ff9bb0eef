import "dotenv/config";
import { loadConfig } from "@/config/config";
import { startServer } from "@/server/lifecycle";
import { createTaskServer } from "@/server/server";
import { safeTry } from "@/utils/result";

const configResult = loadConfig(process.env);
if (configResult.isErr) {
  console.error(configResult.error);
  process.exit(1);
}

const config = configResult.value;
const server = createTaskServer(config);
const running = startServer(server);

const base = `http://${config.host}:${config.port}`;
console.log(`\n  POST   ${base}/tasks`);
console.log(`  GET    ${base}/tasks[?status=]`);
console.log(`  GET    ${base}/tasks/:id`);
console.log(`  PUT    ${base}/tasks/:id`);
console.log(`  DELETE ${base}/tasks/:id`);
console.log(`  GET    ${base}/health\n`);

const stop = async (signal: string) => {
  const result = await safeTry(() => running.shutdown(signal));
  if (result.isErr) {
    server.logger.error({
      atFunction: "main",
      message: "shutdown failed",
      data: {
        signal,
        error:
          result.error instanceof Error
            ? result.error.message
            : String(result.error),
      },
    });
    process.exit(1);
  }
  process.exit(0);
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    stop(signal).catch((error: unknown) => {
      console.error("[main] shutdown crashed:", error);
      process.exit(1);
    });
  });
}
