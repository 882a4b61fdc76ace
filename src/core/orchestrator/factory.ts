import { createBorgClient } from "../../engine";
import { createMetadataStore, createRemoteStore } from "../../storage";
import type { BorgmateConfig } from "../../types";
import { PassphraseStore } from "../passphrase";
import { Orchestrator } from "./orchestrator";

/**
 * Wire an orchestrator from configuration. The metadata backend is chosen
 * here, once.
 */
export async function createOrchestrator(config: BorgmateConfig): Promise<Orchestrator> {
  const store = await createMetadataStore(config);
  return new Orchestrator({
    config,
    engine: createBorgClient(config),
    store,
    remote: createRemoteStore(config),
    passphrases: new PassphraseStore({
      dir: config.paths.passphrasesDir,
      configPassphrase: config.borg.passphrase,
      configNewPassphrase: config.borg.newPassphrase,
    }),
  });
}
