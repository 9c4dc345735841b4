import { InvalidQueryError } from "../errors";
import { isFeatureName, type FeatureName, type FeatureRow, type FeatureVector, type Frame } from "../types";

/** Row-major numeric matrix: `data[row * cols + col]`. */
export type FeatureMatrix = {
    rows: number;
    cols: number;
    columns: readonly FeatureName[];
    data: Float64Array;
};

/**
 * Validate a feature subset against the schema.
 *
 * @throws InvalidQueryError for an empty list or unknown names.
 */
export function resolveFeatures(names: readonly string[]): FeatureName[] {
    if (names.length === 0) {
        throw new InvalidQueryError("at least one feature must be selected");
    }
    const out: FeatureName[] = [];
    const unknown: string[] = [];
    for (const name of names) {
        if (isFeatureName(name)) out.push(name);
        else unknown.push(name);
    }
    if (unknown.length > 0) {
        throw new InvalidQueryError(`unknown feature(s): ${unknown.join(", ")}`);
    }
    return out;
}

/** Query-side projection; same column order as `FeatureTable.select`. */
export function projectVector(vector: FeatureVector, names: readonly string[]): Float64Array {
    const columns = resolveFeatures(names);
    const out = new Float64Array(columns.length);
    columns.forEach((name, i) => {
        out[i] = vector[name];
    });
    return out;
}

/**
 * Frames of one collection (or one target) with their feature vectors.
 *
 * Rows keep insertion order. For a target table that order is the output order.
 * Rows are append-only.
 */
export class FeatureTable implements Iterable<FeatureRow> {
    private readonly entries: FeatureRow[] = [];

    constructor(readonly label: string, rows: Iterable<FeatureRow> = []) {
        for (const row of rows) this.addRow(row.frame, row.features);
    }

    get size(): number {
        return this.entries.length;
    }

    addRow(frame: Frame, features: FeatureVector): void {
        this.entries.push(Object.freeze({ frame, features }));
    }

    /** Append every row of `other`, preserving its order. */
    append(other: Iterable<FeatureRow>): void {
        for (const row of other) this.entries.push(row);
    }

    row(index: number): FeatureRow {
        const row = this.entries[index];
        if (!row) {
            throw new RangeError(`row ${index} out of range (table '${this.label}' has ${this.size} rows)`);
        }
        return row;
    }

    rows(): readonly FeatureRow[] {
        return this.entries;
    }

    frames(): Frame[] {
        return this.entries.map((r) => r.frame);
    }

    [Symbol.iterator](): Iterator<FeatureRow> {
        return this.entries[Symbol.iterator]();
    }

    /**
     * Candidate-side projection: rows in table order, columns in exactly the
     * order of `names`.
     */
    select(names: readonly string[]): FeatureMatrix {
        const columns = resolveFeatures(names);
        const cols = columns.length;
        const data = new Float64Array(this.entries.length * cols);

        this.entries.forEach((row, r) => {
            const off = r * cols;
            columns.forEach((name, c) => {
                data[off + c] = row.features[name];
            });
        });

        return { rows: this.entries.length, cols, columns, data };
    }
}
