import { Actor } from 'apify';

import { TABLE_INDEX_KEY } from './constants.js';
import type { Batch, Log, Row } from './types.js';

const LOG_PREFIX = '[sink]';

export interface TableId {
    dataset: string;
    table: string;
}

export const formatTableId = ({ dataset, table }: TableId): string => `${dataset}.${table}`;

/** Destination for finished batches. `replaceTable` overwrites, so loading the same batch twice is harmless. */
export interface TableSink {
    ensureDataset(dataset: string): Promise<void>;
    replaceTable(tableId: TableId, batch: Batch): Promise<void>;
}

export interface TableIndexEntry {
    columns: string[];
    rowCount: number;
    weekend: string;
    loadedAt: string;
}

export type TableIndex = Record<string, TableIndexEntry>;

/** The parts of an Apify dataset the sink touches. */
export interface TableStorage {
    pushData(rows: Row[]): Promise<void>;
    drop(): Promise<void>;
}

/** The parts of an Apify key-value store the sink touches. */
export interface IndexStorage {
    getValue(key: string): Promise<TableIndex | null>;
    setValue(key: string, value: TableIndex): Promise<void>;
}

export interface StorageOpeners {
    openTable: (name: string) => Promise<TableStorage>;
    openIndex: (name: string) => Promise<IndexStorage>;
}

export interface ApifyTableSinkOptions {
    storage?: StorageOpeners;
    /** Clock for the `loadedAt` stamp in the table index. */
    now?: () => Date;
}

const apifyStorage: StorageOpeners = {
    openTable: async (name) => Actor.openDataset<Row>(name),
    openIndex: async (name) => Actor.openKeyValueStore(name),
};

/** Storage names allow letters, digits and inner hyphens only. */
export const storageName = (...parts: string[]): string =>
    parts
        .join('-')
        .replace(/[^a-zA-Z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');

/**
 * Keeps each table as a named Apify dataset and, per destination dataset, a key-value store whose
 * `TABLES` record lists the loaded tables with their columns.
 */
export class ApifyTableSink implements TableSink {
    private readonly storage: StorageOpeners;

    private readonly now: () => Date;

    constructor(
        private readonly log: Log,
        { storage = apifyStorage, now = () => new Date() }: ApifyTableSinkOptions = {},
    ) {
        this.storage = storage;
        this.now = now;
    }

    async ensureDataset(dataset: string): Promise<void> {
        const index = await this.storage.openIndex(storageName(dataset));
        const tables = await index.getValue(TABLE_INDEX_KEY);
        if (tables === null) {
            await index.setValue(TABLE_INDEX_KEY, {});
            this.log.info(`${LOG_PREFIX} Created dataset ${dataset}`);
        }
    }

    async replaceTable(tableId: TableId, batch: Batch): Promise<void> {
        const name = storageName(tableId.dataset, tableId.table);

        // Drop and reopen: the table ends up holding exactly this batch.
        const previous = await this.storage.openTable(name);
        await previous.drop();
        const table = await this.storage.openTable(name);
        await table.pushData(batch.rows);

        const index = await this.storage.openIndex(storageName(tableId.dataset));
        const tables = (await index.getValue(TABLE_INDEX_KEY)) ?? {};
        await index.setValue(TABLE_INDEX_KEY, {
            ...tables,
            [tableId.table]: {
                columns: batch.columns,
                rowCount: batch.rows.length,
                weekend: batch.window.start,
                loadedAt: this.now().toISOString(),
            },
        });

        this.log.info(`${LOG_PREFIX} Loaded ${batch.rows.length} rows into ${formatTableId(tableId)}`);
    }
}
