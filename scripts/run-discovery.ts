import { sql } from "@/lib/db/client";
import { executeDiscovery } from "@/lib/discovery/service";
import { parseDiscoveryArgs } from "@/lib/request";

async function main(): Promise<void> {
  const request = parseDiscoveryArgs(process.argv.slice(2));
  const controller = new AbortController();

  process.once("SIGINT", () => {
    console.warn("[discovery] interrupt received; cancelling run...");
    controller.abort();
  });

  console.log(`[discovery] launching run for project ${request.projectId}...`);
  const result = await executeDiscovery(request, { signal: controller.signal });

  console.log(JSON.stringify(result, null, 2));
  if (result.status === "error") {
    process.exitCode = 1;
  }
}

async function shutdown(): Promise<void> {
  await sql.end({ timeout: 5 }).catch((error: unknown) => {
    console.warn("[db] failed to close connection pool", { error: error instanceof Error ? error.message : "unknown" });
  });
}

main()
  .then(async () => {
    await shutdown();
  })
  .catch(async (error) => {
    console.error(error);
    await shutdown();
    process.exit(1);
  });
