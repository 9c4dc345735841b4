import type { ConfigOverrides } from "./config";
import { InvalidConfigError } from "./errors";
import { MOSAIC_STEPS, type MosaicStep } from "./runner/runMosaic";
import { LOG_LEVELS, type LogLevel } from "./util/log";

export type CliArgs = {
    step: MosaicStep;
    overrides: ConfigOverrides;
    help: boolean;
};

export const HELP = `
tesserae - rebuild a target recording from frames of a sound collection

Usage: tesserae [analyze|mosaic|all] [options]

Options:
  -t, --target <file>       Target audio file (WAV or Ogg Vorbis)
  -m, --manifest <csv>      Source collection manifest (path + collection_id/freesound_id)
  -f, --frame-size <n>      Frame size in samples (default 8192)
  -b, --beats               Segment the target on tracked beats
  -p, --policy <p>          best | random (default random)
  -k, --neighbours <k>      Candidates for the random policy (default 10)
  -s, --seed <seed>         Seed for the random policy
      --source-table <csv>  Source analysis table (default dataframe_source.csv)
      --target-table <csv>  Target analysis table (default dataframe_target.csv)
  -o, --out <wav>           Output file (default <target>.reconstructed.wav)
      --log-level <level>   debug | info | warn | error | silent
  -h, --help                Show this help
`;

const STEP_NAMES: readonly string[] = MOSAIC_STEPS;
const LEVEL_NAMES: readonly string[] = LOG_LEVELS;

function isStep(value: string): value is MosaicStep {
    return STEP_NAMES.includes(value);
}

function isLogLevel(value: string): value is LogLevel {
    return LEVEL_NAMES.includes(value);
}

function parseInteger(flag: string, value: string | undefined): number {
    const n = Number(value);
    if (value === undefined || !Number.isInteger(n)) {
        throw new InvalidConfigError(`${flag} expects an integer, got '${value ?? ""}'`);
    }
    return n;
}

export function parseArgs(argv: readonly string[]): CliArgs {
    const result: CliArgs = { step: "all", overrides: {}, help: false };
    const o = result.overrides;

    const value = (i: number, flag: string): string => {
        const v = argv[i];
        if (v === undefined || v.startsWith("-")) {
            throw new InvalidConfigError(`${flag} expects a value`);
        }
        return v;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? "";

        switch (arg) {
            case "-t":
            case "--target":
                o.targetPath = value(++i, arg);
                break;
            case "-m":
            case "--manifest":
                o.manifestPath = value(++i, arg);
                break;
            case "-f":
            case "--frame-size":
                o.frameSize = parseInteger(arg, value(++i, arg));
                break;
            case "-b":
            case "--beats":
                o.syncWithBeats = true;
                break;
            case "-p":
            case "--policy": {
                const policy = value(++i, arg);
                if (policy !== "best" && policy !== "random") {
                    throw new InvalidConfigError(`--policy must be 'best' or 'random', got '${policy}'`);
                }
                o.policy = policy;
                break;
            }
            case "-k":
            case "--neighbours":
                o.neighbours = parseInteger(arg, value(++i, arg));
                break;
            case "-s":
            case "--seed":
                o.seed = value(++i, arg);
                break;
            case "--source-table":
                o.sourceTablePath = value(++i, arg);
                break;
            case "--target-table":
                o.targetTablePath = value(++i, arg);
                break;
            case "-o":
            case "--out":
                o.outputPath = value(++i, arg);
                break;
            case "--log-level": {
                const level = value(++i, arg);
                if (!isLogLevel(level)) {
                    throw new InvalidConfigError(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
                }
                o.logLevel = level;
                break;
            }
            case "-h":
            case "--help":
                result.help = true;
                break;
            default:
                if (isStep(arg) && i === 0) {
                    result.step = arg;
                } else {
                    throw new InvalidConfigError(`unknown argument '${arg}'`);
                }
        }
    }

    return result;
}
