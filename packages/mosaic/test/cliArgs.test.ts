import { describe, expect, it } from "vitest";

import { parseArgs } from "../src/cliArgs";
import { InvalidConfigError } from "../src/errors";

describe("parseArgs", () => {
    it("runs every step by default", () => {
        expect(parseArgs([])).toEqual({ step: "all", overrides: {}, help: false });
    });

    it("reads the step and options", () => {
        const args = parseArgs([
            "mosaic",
            "-t",
            "groove.wav",
            "--policy",
            "best",
            "-k",
            "5",
            "--seed",
            "test-seed",
            "-f",
            "4096",
            "--beats",
            "-o",
            "out.wav",
            "--log-level",
            "warn",
        ]);
        expect(args.step).toBe("mosaic");
        expect(args.overrides).toEqual({
            targetPath: "groove.wav",
            policy: "best",
            neighbours: 5,
            seed: "test-seed",
            frameSize: 4096,
            syncWithBeats: true,
            outputPath: "out.wav",
            logLevel: "warn",
        });
    });

    it("accepts table and manifest paths", () => {
        const { overrides } = parseArgs(["analyze", "-m", "sounds.csv", "--source-table", "s.csv", "--target-table", "t.csv"]);
        expect(overrides).toEqual({ manifestPath: "sounds.csv", sourceTablePath: "s.csv", targetTablePath: "t.csv" });
    });

    it("flags help", () => {
        expect(parseArgs(["--help"]).help).toBe(true);
    });

    it("rejects bad input", () => {
        expect(() => parseArgs(["--frame-size", "abc"])).toThrow("--frame-size expects an integer, got 'abc'");
        expect(() => parseArgs(["--target"])).toThrow("--target expects a value");
        expect(() => parseArgs(["-p", "worst"])).toThrow(InvalidConfigError);
        expect(() => parseArgs(["--log-level", "loud"])).toThrow(InvalidConfigError);
        expect(() => parseArgs(["-t", "a.wav", "mosaic"])).toThrow("unknown argument 'mosaic'");
        expect(() => parseArgs(["--fast"])).toThrow("unknown argument '--fast'");
    });
});
