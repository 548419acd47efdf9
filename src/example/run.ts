import {
  RoundRobinLoadBalanceStrategy,
  StaticNamingService,
  loadConfig,
} from "../index.js";

const namingService = new StaticNamingService({
  echo: [
    { host: "10.0.0.1", port: 8122 },
    { host: "10.0.0.2", port: 8122 },
  ],
});

async function main(): Promise<void> {
  const config = loadConfig();
  const strategy = await RoundRobinLoadBalanceStrategy.fromDiscovery(
    "echo",
    namingService,
    {
      onTargetsChanged: (change) =>
        console.log(`targets ${change.kind}: ${change.targets.join(", ")}`),
    },
  );
  strategy.startRefresh(config.refreshDelayMs, config.refreshPeriodMs);

  for (let i = 0; i < 4; i++) {
    console.log(`call ${i + 1} → ${strategy.elect()}`);
  }

  strategy.removeTarget("10.0.0.1:8122");
  console.log(`after failure → ${strategy.elect()}`);
  strategy.recoverTarget("10.0.0.1:8122");

  namingService.set("echo", [
    { host: "10.0.0.2", port: 8122 },
    { host: "10.0.0.3", port: 8122 },
  ]);
  await new Promise((resolve) =>
    setTimeout(resolve, config.refreshDelayMs + config.refreshPeriodMs),
  );

  console.log("\nTargets status:");
  for (const status of strategy.getStatus()) {
    console.log(`  - ${status.target} (weight: ${status.weight}, healthy: ${status.healthy})`);
  }

  strategy.close();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
