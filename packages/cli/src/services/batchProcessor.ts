import path from 'path';
import type { BatchReport, TrackingResult, UploadOptions } from '@minutes-pipeline/shared';
import type {
    IDocumentRenderer,
    IFileManager,
    IResultStore,
    IRunLedger,
    ISpeechClient,
    ISummaryGenerator,
    ITaskTracker
} from '../domain/ports';
import { PipelineError, type Recording } from '../domain/models';
import { FileResultStore } from './resultStore';
import { remainingMinutes } from './speechText';

export interface BatchSettings {
    inboxDir: string;
    outputDir: string;
    extensions: string[];
    upload: UploadOptions;
}

export interface BatchDependencies {
    speech: ISpeechClient;
    tracker: ITaskTracker;
    summarizer: ISummaryGenerator;
    renderer: IDocumentRenderer;
    ledger: IRunLedger;
    fs: IFileManager;
    createStore?: (logPath: string) => IResultStore;
}

export function toRecording(filePath: string): Recording {
    const fileName = path.basename(filePath);
    return { filePath, fileName, baseName: path.parse(fileName).name };
}

/**
 * Drives recordings from the inbox through upload, tracking, rendering and
 * summarisation, one at a time. A failing file is logged and counted; the
 * rest of the batch carries on.
 */
export class BatchProcessor {
    private lastRemainingSeconds?: number;
    private readonly createStore: (logPath: string) => IResultStore;

    constructor(
        private readonly deps: BatchDependencies,
        private readonly settings: BatchSettings
    ) {
        this.createStore = deps.createStore ?? (logPath => new FileResultStore(deps.fs, logPath));
    }

    public get remainingSeconds(): number | undefined {
        return this.lastRemainingSeconds;
    }

    public async run(): Promise<BatchReport> {
        console.log('🚀 Starting batch processing...');

        const found = await this.findRecordings();
        if (found.length === 0) {
            console.log('📭 No recordings found in the inbox directory');
            return { found: 0, processed: 0, succeeded: 0, failed: 0 };
        }

        const moved = await this.moveRecordings(found);
        const pending = await this.filesNeedingTranscription(moved);

        if (pending.length === 0) {
            console.log('✅ All files already have transcripts');
            return { found: found.length, processed: 0, succeeded: 0, failed: 0 };
        }

        console.log(`🎯 Processing ${pending.length} files...`);

        let succeeded = 0;
        for (const recording of pending) {
            console.log(`\n📁 Processing: ${recording.fileName}`);
            if (await this.processFile(recording)) {
                succeeded++;
            }
        }

        const minutes = remainingMinutes(this.lastRemainingSeconds);
        if (minutes !== undefined) {
            console.log(`\n⏰ SpeechText.AI remaining time: ${minutes.toFixed(1)} minutes`);
        } else {
            console.warn('⚠️ Could not determine remaining API time');
        }

        console.log('\n🎉 Batch processing complete!');
        console.log(`✅ Successfully processed: ${succeeded}/${pending.length} files`);

        return {
            found: found.length,
            processed: pending.length,
            succeeded,
            failed: pending.length - succeeded,
            remainingMinutes: minutes
        };
    }

    /**
     * Supported recordings sitting in the inbox, sorted by name.
     */
    public async findRecordings(): Promise<Recording[]> {
        const { inboxDir, extensions } = this.settings;

        if (!(await this.deps.fs.fileExists(inboxDir))) {
            console.warn(`⚠️ Inbox directory not found: ${inboxDir}`);
            return [];
        }

        const supported = extensions.map(ext => ext.toLowerCase());
        const files = (await this.deps.fs.listFiles(inboxDir))
            .filter(file => supported.includes(path.extname(file).toLowerCase()))
            .sort();

        console.log(`📁 Found ${files.length} recording(s) in ${inboxDir}`);
        return files.map(file => toRecording(this.deps.fs.joinPaths(inboxDir, file)));
    }

    /**
     * Moves recordings into the output directory. A file already present
     * there is reused as-is; a failed move drops that file from the batch.
     */
    public async moveRecordings(recordings: Recording[]): Promise<Recording[]> {
        const moved: Recording[] = [];

        for (const recording of recordings) {
            const destination = this.deps.fs.joinPaths(this.settings.outputDir, recording.fileName);

            if (await this.deps.fs.fileExists(destination)) {
                console.log(`📄 File already exists: ${recording.fileName}`);
                moved.push(toRecording(destination));
                continue;
            }

            try {
                await this.deps.fs.moveFile(recording.filePath, destination);
                console.log(`📦 Moved: ${recording.fileName}`);
                moved.push(toRecording(destination));
            } catch (error) {
                console.error(`❌ Failed to move ${recording.fileName}:`, error instanceof Error ? error.message : error);
            }
        }

        return moved;
    }

    public async filesNeedingTranscription(recordings: Recording[]): Promise<Recording[]> {
        const pending: Recording[] = [];

        for (const recording of recordings) {
            if (await this.deps.fs.fileExists(this.deps.renderer.transcriptPathFor(recording.baseName))) {
                console.log(`✅ Already transcribed: ${recording.fileName}`);
            } else {
                console.log(`📝 Needs transcription: ${recording.fileName}`);
                pending.push(recording);
            }
        }

        return pending;
    }

    public async processFile(recording: Recording): Promise<boolean> {
        let recordId: string | undefined;

        try {
            const record = await this.deps.ledger.startRecording(recording.filePath);
            recordId = record.id;

            const taskId = await this.deps.speech.submit(recording.filePath, this.settings.upload);
            const result = await this.track(taskId, recording.baseName, record.id);

            await this.deps.ledger.updateStatus(record.id, 'SUMMARIZING');
            const summary = await this.deps.summarizer.summarize(result.transcript);
            await this.deps.renderer.renderSummary(recording.baseName, summary);

            await this.deps.ledger.markCompleted(record.id);
            console.log(`🎉 Completed processing: ${recording.fileName}`);
            return true;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`❌ Failed to process ${recording.fileName}: ${message}`);
            if (recordId) await this.recordFailure(recordId, message);
            return false;
        }
    }

    private async recordFailure(recordId: string, message: string): Promise<void> {
        try {
            await this.deps.ledger.setError(recordId, message);
        } catch (error) {
            console.error('❌ Could not record the failure in the ledger:', error instanceof Error ? error.message : error);
        }
    }

    /**
     * Tracks a task that was submitted earlier (e.g. by a run that was
     * interrupted) into a fresh log and renders its transcript document.
     */
    public async trackExisting(taskId: string, baseName: string): Promise<TrackingResult> {
        return this.track(taskId, baseName);
    }

    private async track(taskId: string, baseName: string, ledgerId?: string): Promise<TrackingResult> {
        const logPath = this.deps.fs.joinPaths(this.settings.outputDir, `${baseName}_full_transcript.txt`);
        const store = this.createStore(logPath);
        await store.open(baseName);

        if (ledgerId) await this.deps.ledger.setTaskId(ledgerId, taskId, logPath);

        let result: TrackingResult;
        try {
            result = await this.deps.tracker.awaitCompletion(taskId, store);
        } catch (error) {
            if (error instanceof PipelineError) await this.recordQuota(error.remainingQuotaSeconds, ledgerId);
            throw error;
        }
        await this.recordQuota(result.remainingQuotaSeconds, ledgerId);

        await this.deps.renderer.renderTranscript(baseName, result.transcript, store.path);
        return result;
    }

    // Called for failed tasks as well as finished ones
    private async recordQuota(seconds: number | undefined, ledgerId?: string): Promise<void> {
        if (seconds === undefined) return;
        this.lastRemainingSeconds = seconds;
        if (ledgerId) await this.deps.ledger.setRemainingSeconds(ledgerId, seconds);
    }
}
