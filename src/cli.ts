#!/usr/bin/env node
import { promises as fs } from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { Clock } from './services/clock.service';
import { ConfigLoaderService } from './services/config-loader.service';
import { StyleService } from './services/style.service';

const HELP = `
dial-render - render analog clock faces

Usage:
  dial-render create <time> <output> [options]   Render a preset style at a time
  dial-render styles                             List preset styles
  dial-render config <file> <output>             Render a JSON configuration
  dial-render example [dir]                      Render every style at sample times

Options (create):
  -s, --style <name>     Preset style (default: classic)
  -w, --width <px>       Width in pixels (default: 400)
  -h, --height <px>      Height in pixels (default: 400)
  -q, --quality <n>      Supersampling factor, 1-4 (default: 2)
      --no-antialias     Render at target size without supersampling
`;

const EXAMPLE_TIMES = ['12:00:00', '3:15:30', '6:30:45', '9:45:15'];
const EXAMPLE_SIZE = 300;

/** Where CLI output goes; console in normal use */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

class UsageError extends Error {}

function parsePositiveInt(value: string | undefined, name: string, fallback: number, max?: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || (max !== undefined && parsed > max)) {
    throw new UsageError(`${name} must be an integer between 1 and ${max ?? 'infinity'}, got '${value}'`);
  }
  return parsed;
}

async function createCommand(args: string[], out: CliOutput): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      style: { type: 'string', short: 's' },
      width: { type: 'string', short: 'w' },
      height: { type: 'string', short: 'h' },
      quality: { type: 'string', short: 'q' },
      'no-antialias': { type: 'boolean' },
    },
  });

  const [time, output] = positionals;
  if (time === undefined || output === undefined) {
    throw new UsageError('create needs <time> and <output>');
  }

  const clock = Clock.create(time, values.style ?? 'classic', {
    width: parsePositiveInt(values.width, '--width', 400),
    height: parsePositiveInt(values.height, '--height', 400),
    scale_factor: parsePositiveInt(values.quality, '--quality', 2, 4),
    antialias: values['no-antialias'] !== true,
  });

  await clock.save(output);
  out.log(`Clock saved to ${output}`);
}

function stylesCommand(out: CliOutput): void {
  const styleService = new StyleService();
  out.log('Available preset styles:');
  for (const { name, description } of styleService.listPresets()) {
    out.log(`  ${name.padEnd(10)} ${description}`);
  }
}

async function configCommand(args: string[], out: CliOutput): Promise<void> {
  const [configFile, output] = args;
  if (configFile === undefined || output === undefined) {
    throw new UsageError('config needs <file> and <output>');
  }

  const clock = await new ConfigLoaderService().loadClock(configFile);
  await clock.save(output);
  out.log(`Clock created from ${configFile} and saved to ${output}`);
}

async function exampleCommand(args: string[], out: CliOutput): Promise<void> {
  const outputDir = args[0] ?? 'examples';
  await fs.mkdir(outputDir, { recursive: true });

  const styles = new StyleService().listPresets().map(preset => preset.name);
  out.log(`Generating examples in ${outputDir}`);

  for (const style of styles) {
    for (const time of EXAMPLE_TIMES) {
      const clock = Clock.create(time, style, { width: EXAMPLE_SIZE, height: EXAMPLE_SIZE });
      await clock.save(path.join(outputDir, `${style}_${time.replace(/:/g, '')}.png`));
    }
  }

  out.log(`Generated ${styles.length * EXAMPLE_TIMES.length} example clocks`);
}

/**
 * Run one CLI invocation; resolves to the process exit code
 */
export async function runCli(argv: string[], out: CliOutput = console): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'create':
        await createCommand(rest, out);
        return 0;
      case 'styles':
        stylesCommand(out);
        return 0;
      case 'config':
        await configCommand(rest, out);
        return 0;
      case 'example':
        await exampleCommand(rest, out);
        return 0;
      case undefined:
      case 'help':
      case '--help':
        out.log(HELP);
        return 0;
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (error) {
    out.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof UsageError) {
      out.error(HELP);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      console.error('[CLI] Unexpected failure:', error);
      process.exit(1);
    }
  );
}
