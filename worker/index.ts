import { createDependencies, createDriver } from "../src/infrastructure/container";

async function startWorker() {
  const deps = createDependencies();
  const driver = createDriver(deps);

  const missing = deps.collaborators.unconfigured();
  if (missing.length) {
    console.warn(`No command configured for: ${missing.join(", ")}. Jobs reaching those stages will fail.`);
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log("Stopping ClipForge worker, waiting for in-flight jobs.");
    await driver.stop();
    await deps.repo.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("Shutdown failed", err);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  driver.start();
  console.log(
    `ClipForge worker running (pid=${process.pid}, holder=${driver.holderId}, concurrency=${deps.config.driver.concurrency}, db=${deps.config.dbPath}).`
  );
}

startWorker().catch((err) => {
  console.error(err);
  process.exit(1);
});
