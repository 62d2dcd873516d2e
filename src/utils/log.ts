import cliProgress from 'cli-progress';

let progressBar: cliProgress.SingleBar | null = null;

/**
 * Whether batch runs draw a progress bar by default (PROGRESS_BAR=false turns it off)
 */
export function showProgressBar(): boolean {
  return process.env.PROGRESS_BAR !== 'false';
}

/**
 * Initializes a progress bar for a batch run
 *
 * @param total - Number of steps in the run
 * @param label - Shown after the bar (e.g. the run id)
 */
export function initProgressBar(total: number, label: string = 'Panorama') {
  progressBar = new cliProgress.SingleBar({
    format: `${label} |{bar}| {percentage}% | {value} / {total} | {country}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  progressBar.start(total, 0, { country: '' });
}

/**
 * Increments the progress bar by one step
 */
export function incrementProgressBar(country: string = '') {
  progressBar?.increment(1, { country });
}

/**
 * Stops and cleans up the progress bar
 */
export function stopProgressBar() {
  progressBar?.stop();
  progressBar = null;
}
