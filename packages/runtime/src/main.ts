import { createRuntime } from "./bootstrap";
import { loadConfig } from "./config";

const runtime = await createRuntime(loadConfig());
await runtime.start();

const report = await runtime.ops.status();
console.info("chatseq is running", { status: report.status, warnings: report.warnings });

// nothing else holds the event loop open between checks
const keepAlive = setInterval(() => undefined, 2 ** 30);
let stopping = false;

async function shutdown(signal: NodeJS.Signals) {
  if (stopping) return;
  stopping = true;
  console.info(`Received ${signal}, shutting down`);
  clearInterval(keepAlive);

  try {
    await runtime.close();
    process.exit(0);
  } catch (error) {
    console.error("Shutdown failed", error);
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}
