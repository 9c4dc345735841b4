import { readFile, writeFile } from "node:fs/promises";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import { makeFeatureVector } from "../analysis/featureVector";
import { errorMessage, TablePersistenceError } from "../errors";
import { FEATURE_NAMES, frameId, type FeatureName } from "../types";

import { FeatureTable } from "./featureTable";

export const FRAME_COLUMNS = ["collection_id", "frame_id", "path", "start_sample", "end_sample"] as const;

export const TABLE_COLUMNS: readonly string[] = [...FRAME_COLUMNS, ...FEATURE_NAMES];

const FRAME_ID_SUFFIX = /_f(\d+)$/;

const NOT_FINITE = "must be a finite number";

const finiteNumber = z
    .string()
    .min(1, "is empty")
    .pipe(z.coerce.number({ invalid_type_error: NOT_FINITE }).finite(NOT_FINITE));

const sampleIndex = z
    .string()
    .min(1, "is empty")
    .pipe(z.coerce.number({ invalid_type_error: "must be a sample index" }).int().nonnegative());

const frameSchema = z
    .object({
        collection_id: z.string().min(1),
        frame_id: z.string().regex(FRAME_ID_SUFFIX, "must end in _f<index>"),
        path: z.string().min(1),
        start_sample: sampleIndex,
        end_sample: sampleIndex,
    })
    .refine((r) => r.start_sample < r.end_sample, "start_sample must be < end_sample");

const featureSchema = z.record(z.string(), z.unknown());

/** One CSV line per frame: frame columns, then one column per feature in schema order. */
export function serializeTable(table: FeatureTable): string {
    const records = table.rows().map(({ frame, features }) => [
        frame.collectionId,
        frameId(frame),
        frame.sourcePath,
        frame.startSample,
        frame.endSample,
        ...FEATURE_NAMES.map((name) => features[name]),
    ]);
    return stringify(records, { header: true, columns: [...TABLE_COLUMNS] });
}

function parseFeature(record: Record<string, unknown>, name: FeatureName, line: number): number {
    const parsed = finiteNumber.safeParse(record[name]);
    if (!parsed.success) {
        throw new TablePersistenceError(`line ${line}: column '${name}' ${parsed.error.issues[0]?.message ?? "is invalid"}`);
    }
    return parsed.data;
}

/**
 * Rebuild a table from `serializeTable` output.
 *
 * @throws TablePersistenceError naming the first malformed line.
 */
export function parseTable(text: string, label: string): FeatureTable {
    let records: unknown;
    try {
        records = parse(text, { columns: true, skip_empty_lines: true });
    } catch (err) {
        throw new TablePersistenceError(`cannot parse table '${label}': ${errorMessage(err)}`, { cause: err });
    }
    if (!Array.isArray(records)) {
        throw new TablePersistenceError(`table '${label}' did not parse to rows`);
    }

    const table = new FeatureTable(label);
    records.forEach((raw: unknown, i) => {
        // Header is line 1.
        const line = i + 2;
        const record = featureSchema.parse(raw);

        const missing = TABLE_COLUMNS.filter((c) => !(c in record));
        if (missing.length > 0) {
            throw new TablePersistenceError(`line ${line}: missing column(s) ${missing.join(", ")}`);
        }

        const frame = frameSchema.safeParse(record);
        if (!frame.success) {
            const issue = frame.error.issues[0];
            throw new TablePersistenceError(
                `line ${line}: ${issue ? `${issue.path.join(".") || "row"} ${issue.message}` : "invalid frame"}`
            );
        }

        const { collection_id, frame_id, path, start_sample, end_sample } = frame.data;
        const index = FRAME_ID_SUFFIX.exec(frame_id)?.[1];
        if (index === undefined || frame_id !== `${collection_id}_f${index}`) {
            throw new TablePersistenceError(`line ${line}: frame_id '${frame_id}' does not belong to '${collection_id}'`);
        }

        table.addRow(
            Object.freeze({
                collectionId: collection_id,
                frameIndex: Number(index),
                sourcePath: path,
                startSample: start_sample,
                endSample: end_sample,
            }),
            makeFeatureVector((name) => parseFeature(record, name, line))
        );
    });

    return table;
}

export async function writeTable(table: FeatureTable, path: string): Promise<void> {
    await writeFile(path, serializeTable(table), "utf8");
}

export async function readTable(path: string, label = path): Promise<FeatureTable> {
    let text: string;
    try {
        text = await readFile(path, "utf8");
    } catch (err) {
        throw new TablePersistenceError(`cannot read table ${path}: ${errorMessage(err)}`, { cause: err });
    }
    return parseTable(text, label);
}
