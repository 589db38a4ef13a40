import { createDependencies, createDriver } from "../src/infrastructure/container";
import { parseArgs, runCommand } from "./operatorCommands";

// Usage examples:
//  - npx tsx scripts/clipforge.ts create --source=clip-123 --title="Big play"
//  - npx tsx scripts/clipforge.ts list --stage=FAILED
//  - npx tsx scripts/clipforge.ts reset <jobId>
//  - npx tsx scripts/clipforge.ts run --once

async function main() {
  const deps = createDependencies();
  try {
    const code = await runCommand(parseArgs(process.argv.slice(2)), {
      deps,
      out: (line) => console.log(line),
      createDriver: () => createDriver(deps)
    });
    process.exitCode = code;
  } finally {
    await deps.repo.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
