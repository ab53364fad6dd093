/**
 * Engine lifecycle for CLI commands
 */

import { UciClient } from '@enginelens/uci';

import type { EngineLensConfig } from '../config/schema.js';
import { createEngineError } from '../errors/cli-errors.js';
import type { ProgressReporter } from '../progress/reporter.js';

/**
 * Spawn the configured engine and complete the handshake
 *
 * @throws EngineError with a suggestion when the engine cannot be started
 */
export async function initializeEngine(
  config: EngineLensConfig,
  reporter: ProgressReporter,
): Promise<UciClient> {
  const { engine } = config;
  reporter.startEngine(engine.path);

  try {
    const client = await UciClient.start({
      enginePath: engine.path,
      args: engine.args,
      threads: engine.threads,
      multiPv: engine.multiPv,
      handshakeTimeoutMs: engine.handshakeTimeoutMs,
      logger: reporter.logger,
    });
    reporter.engineReady(engine.path);
    return client;
  } catch (error) {
    reporter.fail(`Could not start ${engine.path}`);
    throw createEngineError(engine.path, error);
  }
}

/**
 * Run `task` against a freshly started engine, shutting it down afterwards
 */
export async function withEngine<T>(
  config: EngineLensConfig,
  reporter: ProgressReporter,
  task: (client: UciClient) => Promise<T>,
): Promise<T> {
  const client = await initializeEngine(config, reporter);
  try {
    return await task(client);
  } catch (error) {
    reporter.fail('Analysis failed');
    throw createEngineError(config.engine.path, error);
  } finally {
    await client.shutdown();
  }
}
