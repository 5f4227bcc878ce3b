import fs from 'fs';
import cliProgress from 'cli-progress';
import { loadServerConfig } from './config/config';

/**
 * Logs a message to a file with optional reset flag
 *
 * @param message - The message to log to the file
 * @param reset - If true, overwrites the file; if false, appends to the file
 */
export function logToFile(message: string, reset: boolean = false) {
  const logFile = fs.createWriteStream(loadServerConfig().logFile, { flags: reset ? 'w' : 'a' });
  logFile.write(message + '\n');
  logFile.end();
}

type Timed = ((...args: never[]) => unknown) | string;

const functionTimings: Record<string, number> = {};

function timingName(fn: Timed): string {
  return typeof fn === 'string' ? fn : fn.name;
}

function getIndent() {
  return '|  '.repeat(Object.keys(functionTimings).length);
}

/**
 * Starts timing a metric computation. Only active when LOG_TIMINGS is "true".
 *
 * @param fn - Function or function name to start timing for
 */
export function startTiming(fn: Timed) {
  if (!loadServerConfig().logTimings) {
    return;
  }
  const name = timingName(fn);
  logToFile(`=== ${getIndent()}|  ${name} started`);
  functionTimings[name] = Date.now();
}

/**
 * Ends timing for a function started with startTiming and logs the duration
 *
 * @param fn - Function or function name to end timing for
 */
export function endTiming(fn: Timed) {
  const name = timingName(fn);
  const startTime = functionTimings[name];
  if (!loadServerConfig().logTimings || startTime === undefined) {
    return;
  }
  delete functionTimings[name];
  logToFile(`=== ${getIndent()}|  ${name} took ${Math.round(Date.now() - startTime) / 1000}s`);
}

let progressBar: cliProgress.SingleBar | null = null;

/**
 * Initializes a progress bar for long rebuilds
 *
 * @param total - Number of steps to process
 * @param label - Text shown after the counter
 */
export function initProgressBar(total: number, label: string = 'transactions') {
  progressBar = new cliProgress.SingleBar({
    format: `Progress |{bar}| {percentage}% | {value} / {total} ${label}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  progressBar.start(total, 0);
}

/**
 * Increments the progress bar by one step
 */
export function incrementProgressBar() {
  progressBar?.increment();
}

/**
 * Stops and cleans up the progress bar
 */
export function stopProgressBar() {
  progressBar?.stop();
  progressBar = null;
}
