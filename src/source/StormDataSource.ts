import { readFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { gunzipSync } from 'node:zlib';
import unbzip2Stream from 'unbzip2-stream';

import { createLogger } from '../utils/Logger.ts';

import type { RawDataset } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Loads the storm event CSV from a local file or an HTTP(S) URL.
 * Gzip and bzip2 files are decompressed in memory.
 */
export class StormDataSource {
    location: string;
    datasetName: string;
    private logger: Logger;

    constructor(location: string) {
        this.logger = createLogger('StormDataSource');
        this.location = location;
        this.datasetName = this.extractDatasetName(location);
    }

    async fetchRaw(): Promise<RawDataset> {
        const bytes = this.isRemote()
            ? await this.download()
            : await this.readLocal();

        const data = (await this.decompress(bytes)).toString('utf-8');

        this.logger.info(`Loaded ${this.datasetName}: ${data.length} characters`);
        return { format: 'csv', data, sourceName: this.datasetName };
    }

    isRemote(): boolean {
        return /^https?:\/\//i.test(this.location);
    }

    private async download(): Promise<Buffer> {
        this.logger.info(`Downloading storm data from: ${this.location}`);

        const response = await fetch(this.location, { redirect: 'follow' });
        if (!response.ok) {
            let err: string = `Failed to download storm data. Status code: ${response.status}`;
            this.logger.error(err);
            throw new Error(err);
        }

        return Buffer.from(await response.arrayBuffer());
    }

    private async readLocal(): Promise<Buffer> {
        this.logger.info(`Reading storm data from: ${this.location}`);
        return readFile(this.location);
    }

    private async decompress(bytes: Buffer): Promise<Buffer> {
        const fileName = this.fileName();
        if (fileName.endsWith('.gz')) {
            return gunzipSync(bytes);
        }
        if (!fileName.endsWith('.bz2')) {
            return bytes;
        }

        this.logger.info(`Decompressing bzip2 archive (${bytes.length} bytes)...`);
        const chunks: Buffer[] = [];
        try {
            for await (const chunk of Readable.from([bytes]).pipe(unbzip2Stream())) {
                chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
            }
        } catch (cause) {
            let err: string = `Failed to decompress bzip2 archive: ${this.location}`;
            this.logger.error({ originalError: cause }, err);
            throw new Error(err, { cause });
        }
        return Buffer.concat(chunks);
    }

    private fileName(): string {
        const path = this.isRemote() ? new URL(this.location).pathname : this.location;
        return path.substring(path.replace(/\\/g, '/').lastIndexOf('/') + 1).toLowerCase();
    }

    /**
     * 'data/repdata_data_StormData.csv.gz' -> 'repdata_data_StormData'
     */
    private extractDatasetName(location: string): string {
        const path = this.isRemote() ? new URL(location).pathname : location;
        const base = path.substring(path.replace(/\\/g, '/').lastIndexOf('/') + 1);
        const name = base.replace(/(\.(gz|bz2))?$/i, '').replace(/\.csv$/i, '');
        if (name === '') {
            let err: string = `Failed to find a file name in the given location. Location that was used: ${location}`;
            this.logger.error(err);
            throw new Error(err);
        }
        return name;
    }
}
