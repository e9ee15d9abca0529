/**
 * Record Store
 * Read-only collections the engine queries, loaded once from JSON exports.
 *
 * DATA LAYOUT:
 * ============
 *   {dataDir}/collisions.json      IncidentRecord[]
 *   {dataDir}/requests.json        ServiceRequestRecord[]
 *   {dataDir}/transit-stops.json   TransitStopRecord[]
 *   {dataDir}/weather.json         WeatherRecord[]
 *
 * A missing file loads as an empty collection. A file that does not match
 * its schema stops the load with a SchemaDriftError: queries never run on a
 * store whose columns have drifted.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { logger } from "../core/logger.js";
import { SchemaDriftError, ValidationError } from "../core/errors.js";
import {
  IncidentRecordSchema,
  ServiceRequestRecordSchema,
  TransitStopRecordSchema,
  WeatherRecordSchema,
  type IncidentRecord,
  type ServiceRequestRecord,
  type TransitStopRecord,
  type WeatherRecord,
} from "../schemas/index.js";

export interface RecordCollections {
  incidents: readonly IncidentRecord[];
  requests: readonly ServiceRequestRecord[];
  stops: readonly TransitStopRecord[];
  weather: readonly WeatherRecord[];
}

export const DATASET_FILES = {
  incidents: "collisions.json",
  requests: "requests.json",
  stops: "transit-stops.json",
  weather: "weather.json",
} as const;

export type DatasetName = keyof typeof DATASET_FILES;

const DATASET_NAMES: readonly DatasetName[] = ["incidents", "requests", "stops", "weather"];

/**
 * Unvalidated rows per dataset, as read from disk
 */
export type RawCollections = Partial<Record<DatasetName, unknown>>;

function freezeAll<T extends object>(records: readonly T[]): readonly T[] {
  return Object.freeze(records.map((r) => Object.freeze(r)));
}

export class RecordStore {
  readonly incidents: readonly IncidentRecord[];
  readonly requests: readonly ServiceRequestRecord[];
  readonly stops: readonly TransitStopRecord[];
  readonly weather: readonly WeatherRecord[];

  constructor(collections: Partial<RecordCollections> = {}) {
    this.incidents = freezeAll(collections.incidents ?? []);
    this.requests = freezeAll(collections.requests ?? []);
    this.stops = freezeAll(collections.stops ?? []);
    this.weather = freezeAll(collections.weather ?? []);
  }

  /**
   * Build a store from raw rows, validating each collection
   */
  static fromRaw(raw: RawCollections): RecordStore {
    return new RecordStore({
      incidents: parseDataset("incidents", IncidentRecordSchema, raw.incidents ?? []),
      requests: parseDataset("requests", ServiceRequestRecordSchema, raw.requests ?? []),
      stops: parseDataset("stops", TransitStopRecordSchema, raw.stops ?? []),
      weather: parseDataset("weather", WeatherRecordSchema, raw.weather ?? []),
    });
  }

  get isEmpty(): boolean {
    return this.incidents.length === 0 && this.requests.length === 0;
  }

  counts(): Record<DatasetName, number> {
    return {
      incidents: this.incidents.length,
      requests: this.requests.length,
      stops: this.stops.length,
      weather: this.weather.length,
    };
  }
}

function parseDataset<S extends z.ZodTypeAny>(
  dataset: DatasetName,
  schema: S,
  rows: unknown
): z.output<S>[] {
  const result = z.array(schema).safeParse(rows);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new SchemaDriftError(DATASET_FILES[dataset], issues, result.error);
  }
  return result.data;
}

async function readJsonFile(filePath: string): Promise<unknown | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${filePath}`, {
      field: path.basename(filePath),
      expected: "JSON array",
      context: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
}

/**
 * Load and validate the four collections from a data directory
 */
export async function loadRecordStore(dataDir: string): Promise<RecordStore> {
  const log = logger.child({ component: "record-store" });
  const raw: RawCollections = {};

  for (const dataset of DATASET_NAMES) {
    const filePath = path.join(dataDir, DATASET_FILES[dataset]);
    const content = await readJsonFile(filePath);
    if (content === undefined) {
      log.warn("Dataset file missing, loading empty collection", { file: filePath });
      continue;
    }
    raw[dataset] = content;
  }

  const store = RecordStore.fromRaw(raw);

  log.info("Records loaded", { dataDir, ...store.counts() });
  return store;
}
