// apps/auth-server/src/server.ts
import { buildApp, createAuthRuntime } from "./app";

const runtime = createAuthRuntime(process.env);
const app = buildApp(runtime);

app.listen(runtime.config.port, () => {
  console.log("[boot] listening on :%d", runtime.config.port);
});

// Re-read configuration; scheme options are rebuilt on next use.
process.on("SIGHUP", () => {
  try {
    runtime.reload(process.env);
    console.log("[reload] configuration reloaded");
  } catch (err) {
    console.error("[reload] failed, keeping previous options", err);
  }
});
