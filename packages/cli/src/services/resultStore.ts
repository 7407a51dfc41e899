import type { IFileManager, IResultStore } from '../domain/ports';
import { formatLogHeader } from './transcriptLog';

/**
 * Text log of every poll snapshot for one recording.
 * open() starts a fresh file; append() never truncates.
 */
export class FileResultStore implements IResultStore {
    constructor(
        private readonly fs: IFileManager,
        public readonly path: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    public async open(title: string): Promise<void> {
        await this.fs.writeFile(this.path, formatLogHeader(title, this.now()));
    }

    public async append(text: string): Promise<void> {
        await this.fs.appendFile(this.path, text);
    }
}
