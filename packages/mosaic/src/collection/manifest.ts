import { readFile } from "node:fs/promises";

import { parse } from "csv-parse/sync";
import { z } from "zod";

import { errorMessage, TablePersistenceError } from "../errors";

/**
 * One sound supplied by the retrieval step.
 *
 * `metadata` (licence, tags, author...) is carried for reporting only.
 */
export type CollectionEntry = {
    collectionId: string;
    path: string;
    metadata: Readonly<Record<string, string>>;
};

/** Id columns accepted, in order of preference. */
export const ID_COLUMNS = ["collection_id", "freesound_id"] as const;

const recordSchema = z.record(z.string(), z.string());

/**
 * Parse a manifest CSV: a `path` column, an id column (`collection_id` or
 * `freesound_id`), and any number of metadata columns.
 *
 * @throws TablePersistenceError for missing columns or empty ids/paths.
 */
export function parseManifest(text: string, label = "manifest"): CollectionEntry[] {
    let raw: unknown;
    try {
        raw = parse(text, { columns: true, skip_empty_lines: true });
    } catch (err) {
        throw new TablePersistenceError(`cannot parse ${label}: ${errorMessage(err)}`, { cause: err });
    }

    const rows = z.array(recordSchema).safeParse(raw);
    if (!rows.success) {
        throw new TablePersistenceError(`${label} did not parse to rows`, { cause: rows.error });
    }

    return rows.data.map((record, i) => {
        const line = i + 2;
        const idColumn = ID_COLUMNS.find((c) => c in record);
        const collectionId = idColumn ? record[idColumn] : undefined;
        const path = record.path;
        if (!collectionId) {
            throw new TablePersistenceError(`${label} line ${line}: missing ${ID_COLUMNS.join(" or ")}`);
        }
        if (!path) {
            throw new TablePersistenceError(`${label} line ${line}: missing path`);
        }

        const metadata: Record<string, string> = {};
        for (const [key, value] of Object.entries(record)) {
            if (key === "path" || key === idColumn) continue;
            metadata[key] = value;
        }
        return { collectionId, path, metadata: Object.freeze(metadata) };
    });
}

export async function readManifest(path: string): Promise<CollectionEntry[]> {
    let text: string;
    try {
        text = await readFile(path, "utf8");
    } catch (err) {
        throw new TablePersistenceError(`cannot read manifest ${path}: ${errorMessage(err)}`, { cause: err });
    }
    return parseManifest(text, path);
}
