import * as core from "@actions/core";
import { loadConfig } from "./config.js";
import { sendNotification } from "./output/telegram.js";
import { Poller } from "./poller.js";
import { fetchPublicKernels } from "./sources/kaggle.js";
import {
  FileStateStore,
  MemoryStateStore,
  SeededStateStore,
  seedFromInputs,
} from "./tracker/store.js";
import type { WatchConfig } from "./config.js";
import type { StateStore } from "./tracker/store.js";

const DEFAULT_CONFIG_PATH = "kernel-watch.yml";

function createStore(config: WatchConfig): StateStore {
  let store: StateStore;
  if (config.state_file) {
    store = new FileStateStore(config.state_file);
  } else {
    core.info("No state_file configured, keeping the best score in memory");
    store = new MemoryStateStore();
  }

  const seed = seedFromInputs(
    core.getInput("previous_best_score"),
    core.getInput("previous_best_kernel")
  );
  if (!seed) return store;
  core.info(`Seeding best score ${seed.score} from the previous run`);
  return new SeededStateStore(store, seed);
}

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path") || DEFAULT_CONFIG_PATH;
    const dryRun = core.getInput("dry_run") === "true";
    const once = core.getInput("once") === "true";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    const poller = new Poller(config, {
      deps: {
        fetchKernels: (competition, cfg) => fetchPublicKernels(competition, cfg),
        notify: (message, cfg) => sendNotification(message, cfg),
        store: createStore(config),
      },
      dryRun,
    });

    if (once) {
      const result = await poller.pollOnce();
      core.setOutput("best_score", result.state.score ?? "");
      core.setOutput("best_kernel", result.state.kernelIdentifier ?? "");
      core.setOutput("notified", result.notified);
      return;
    }

    const shutdown = () => {
      core.info("Stopping kernel watch");
      poller.stop();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    core.info(
      `Watching ${config.competition} every ${config.poll_interval_seconds} seconds (${config.sort_direction})`
    );
    await poller.run();
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
