/**
 * Analyze command implementation
 */

import { summarizeSession, type SessionSummary } from '@enginelens/core';
import type { AnalysisEvent } from '@enginelens/types';
import type { UciClient } from '@enginelens/uci';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/index.js';
import { handleError } from '../errors/index.js';
import { withEngine } from '../orchestrator/services.js';
import { parseMoveList, resolvePosition, type ResolvedPosition } from '../position.js';
import {
  formatCandidate,
  formatConfigDisplay,
  formatRanking,
  ProgressReporter,
} from '../progress/index.js';

/**
 * How a search is bounded and printed
 */
export interface AnalysisRequest {
  position: ResolvedPosition;
  /** Fixed depth; ignored when `movetimeMs` is set */
  depth: number;
  /** Search without a depth limit and stop after this long (ms) */
  movetimeMs?: number;
  json: boolean;
}

/**
 * Pass events through while printing each one
 */
async function* tap(
  events: AsyncIterable<AnalysisEvent>,
  onEvent: (event: AnalysisEvent) => void,
): AsyncGenerator<AnalysisEvent> {
  for await (const event of events) {
    onEvent(event);
    yield event;
  }
}

/**
 * Run one search, printing every event as it arrives
 */
export async function streamAnalysis(
  client: UciClient,
  request: AnalysisRequest,
  reporter: ProgressReporter,
  print: (line: string) => void = console.log,
): Promise<SessionSummary> {
  const { position } = request;
  const signal =
    request.movetimeMs !== undefined ? AbortSignal.timeout(request.movetimeMs) : undefined;
  const depthLimit = request.movetimeMs !== undefined ? undefined : request.depth;
  const label = depthLimit !== undefined ? `Searching to depth ${depthLimit}` : 'Searching';

  const session = client.analyze(
    position.fen,
    position.moves,
    depthLimit,
    signal ? { signal } : {},
  );
  reporter.startSearch(label);

  const summary = await summarizeSession(
    tap(session, (event) => {
      if (request.json) {
        print(JSON.stringify(event));
        return;
      }
      if (event.type === 'candidate') {
        reporter.updateSearch(label, event);
        print(formatCandidate(event, reporter.c));
      }
    }),
  );
  await session.finished;

  reporter.succeed(summary.bestMove ? `Best move ${summary.bestMove}` : 'Search stopped');
  return summary;
}

/**
 * Print the ranked candidates of a finished search
 */
export function printSummary(
  summary: SessionSummary,
  reporter: ProgressReporter,
  print: (line: string) => void = console.log,
): void {
  print('');
  if (summary.ranked.length === 0) {
    print(reporter.c.yellow('No candidate moves'));
    return;
  }
  print(reporter.c.bold(`Candidates at depth ${summary.depth}:`));
  print(formatRanking(summary.ranked, reporter.c));
}

/**
 * Main analyze command handler
 */
export async function analyzeCommand(
  fen: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    silent: options.json ?? false,
    color: !options.noColor,
    debug: options.debug ?? false,
  });

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    const position = resolvePosition(fen, parseMoveList(options.moves ?? ''));
    reporter.printHeader(VERSION);

    const request: AnalysisRequest = {
      position,
      depth: config.analysis.depth,
      json: options.json ?? false,
    };
    if (options.movetime !== undefined) {
      request.movetimeMs = options.movetime;
    }

    const summary = await withEngine(config, reporter, (client) =>
      streamAnalysis(client, request, reporter),
    );
    if (!request.json) {
      printSummary(summary, reporter);
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
