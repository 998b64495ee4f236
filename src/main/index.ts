/**
 * dropsync CLI entry point
 *
 *   dropsync plan <manifest.json> [--json] [--sort]
 *   dropsync render <manifest.json> [--output file.mp4] [--fps 60] [--resolution source|720p|1080p] [--sort]
 *   dropsync probe <file...>
 */

import { parseArgs } from 'util';
import { loadConfig, loadEnvFile } from './config';
import { runCommand } from './commands/handlers';
import { buildPlan, formatPlanTable } from './commands/plan-command';
import { formatProbed, probeFiles } from './commands/probe-command';
import { renderMontage } from './commands/render-command';
import { createLogger, setLogLevel } from './logger';
import { cancelActiveExport, getActiveJobId } from './services/export';
import { configureFfmpeg } from './services/ffmpeg';
import { renderJobStore } from './stores/renderJobStore';
import { COMMANDS, CommandResult, ExportResolution, isCommandError } from '../types/commands';

const log = createLogger('CLI');

export const USAGE = `Usage: dropsync <command> [options]

Commands:
  plan <manifest>     Probe the clips and song, print where every clip lands
  render <manifest>   Plan, then render the montage with ffmpeg
  probe <file...>     Print media metadata

Options:
  --json              Print results as JSON (plan, probe)
  --sort              Order clips by the number in their filename (clip1, clip2, ...)
  -o, --output <file> Output file (render)
  --fps <n>           Output frame rate (render)
  --resolution <r>    source | 720p | 1080p (render)
  --env-file <file>   Load environment variables from this file
  -q, --quiet         Only print errors
  -h, --help          Show this help`;

const RESOLUTIONS: readonly ExportResolution[] = ['source', '720p', '1080p'];

const isResolution = (value: string): value is ExportResolution =>
  RESOLUTIONS.some((r) => r === value);

export interface CliOptions {
  command: string | undefined;
  positionals: string[];
  json: boolean;
  sort: boolean;
  quiet: boolean;
  help: boolean;
  output?: string;
  fps?: number;
  resolution?: ExportResolution;
  envFile?: string;
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws Error on unknown flags or invalid --fps / --resolution values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      json: { type: 'boolean', default: false },
      sort: { type: 'boolean', default: false },
      quiet: { type: 'boolean', short: 'q', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      output: { type: 'string', short: 'o' },
      fps: { type: 'string' },
      resolution: { type: 'string' },
      'env-file': { type: 'string' },
    },
  });

  let fps: number | undefined;
  if (values.fps !== undefined) {
    fps = Number(values.fps);
    if (!Number.isInteger(fps) || fps <= 0) {
      throw new Error(`--fps must be a positive integer, got "${values.fps}"`);
    }
  }

  let resolution: ExportResolution | undefined;
  if (values.resolution !== undefined) {
    if (!isResolution(values.resolution)) {
      throw new Error(`--resolution must be one of ${RESOLUTIONS.join(', ')}, got "${values.resolution}"`);
    }
    resolution = values.resolution;
  }

  const [command, ...rest] = positionals;
  return {
    command,
    positionals: rest,
    json: values.json ?? false,
    sort: values.sort ?? false,
    quiet: values.quiet ?? false,
    help: values.help ?? false,
    output: values.output,
    fps,
    resolution,
    envFile: values['env-file'],
  };
}

function report<T>(result: CommandResult<T>, print: (value: T) => void): number {
  if (isCommandError(result)) {
    console.error(`Error: ${result.error}`);
    if (result.details) console.error(result.details);
    return 1;
  }
  print(result);
  return 0;
}

/**
 * Print render progress to stderr, one line per whole percent.
 */
function watchRenderProgress(): () => void {
  let lastPercent = -1;
  return renderJobStore.subscribe((state) => {
    const event = state.toEvent();
    if (!event || event.status !== 'processing') return;
    const percent = Math.floor(event.percent);
    if (percent === lastPercent) return;
    lastPercent = percent;
    const eta = event.etaSeconds !== undefined ? `, ${event.etaSeconds.toFixed(1)}s of video left` : '';
    process.stderr.write(`[RENDER] ${event.jobId} ${percent}% (${event.currentSeconds.toFixed(1)}s${eta})\n`);
  });
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    return 2;
  }

  if (options.help || !options.command) {
    console.log(USAGE);
    return options.help ? 0 : 2;
  }

  loadEnvFile(options.envFile);
  const config = loadConfig();
  setLogLevel(options.quiet ? 'error' : config.logLevel);
  configureFfmpeg(config);

  const [target] = options.positionals;

  switch (options.command) {
    case COMMANDS.PLAN: {
      if (!target) {
        console.error('Error: plan needs a manifest path');
        return 2;
      }
      const result = await runCommand(COMMANDS.PLAN, () =>
        buildPlan({ manifestPath: target, sortByNumber: options.sort })
      );
      return report(result, (plan) => {
        console.log(options.json ? JSON.stringify(plan, null, 2) : formatPlanTable(plan));
      });
    }

    case COMMANDS.RENDER: {
      if (!target) {
        console.error('Error: render needs a manifest path');
        return 2;
      }
      // with a SIGINT listener Node no longer exits on Ctrl+C
      const interrupted = new AbortController();
      const onSigint = () => {
        log.warn(`Interrupted, cancelling ${getActiveJobId() ?? 'render'}...`);
        interrupted.abort();
        cancelActiveExport();
      };
      process.on('SIGINT', onSigint);
      const unsubscribe = options.quiet ? () => undefined : watchRenderProgress();
      try {
        const result = await runCommand(COMMANDS.RENDER, () =>
          renderMontage(
            {
              manifestPath: target,
              sortByNumber: options.sort,
              outputPath: options.output,
              fps: options.fps,
              resolution: options.resolution,
            },
            config,
            interrupted.signal
          )
        );
        return report(result, (rendered) => {
          console.log(
            options.json
              ? JSON.stringify(rendered, null, 2)
              : `Montage generated: ${rendered.outputPath} (${rendered.placedClips} clip(s), ${rendered.totalDuration.toFixed(3)}s)`
          );
        });
      } finally {
        unsubscribe();
        process.off('SIGINT', onSigint);
      }
    }

    case COMMANDS.PROBE: {
      const result = await runCommand(COMMANDS.PROBE, () => probeFiles({ paths: options.positionals }));
      return report(result, (probed) => {
        if (options.json) {
          console.log(JSON.stringify(probed.files, null, 2));
          return;
        }
        probed.files.forEach((file) => console.log(formatProbed(file)));
      });
    }

    default:
      console.error(`Error: unknown command "${options.command}"`);
      console.error(USAGE);
      return 2;
  }
}
