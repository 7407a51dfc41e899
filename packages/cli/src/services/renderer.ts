import path from 'path';
import type { IDocumentRenderer, IFileManager } from '../domain/ports';
import { DocumentKind, documentTemplates } from '../templates/documentTemplates';
import { extractTranscript, formatLongDate } from './transcriptLog';

export const TRANSCRIPT_UNREADABLE = 'Transcript processing error - please check the full transcript file.';

/**
 * Splits a transcript into readable paragraphs. Text that already has blank
 * lines keeps them; a single block is regrouped by sentence (five per
 * paragraph, or three once the paragraph passes 200 characters).
 */
export function splitIntoParagraphs(text: string): string[] {
    const blocks = text.split('\n\n');
    if (blocks.length > 1) {
        return blocks.map(block => block.trim()).filter(block => block.length > 0);
    }

    const sentences = text.split('. ').map(s => s.trim()).filter(s => s.length > 0);
    const paragraphs: string[] = [];
    let current: string[] = [];

    for (const sentence of sentences) {
        current.push(/[.!?]$/.test(sentence) ? sentence : `${sentence}.`);
        const joined = current.join(' ');

        if ((current.length >= 3 && joined.length > 200) || current.length >= 5) {
            paragraphs.push(joined);
            current = [];
        }
    }

    if (current.length > 0) paragraphs.push(current.join(' '));
    return paragraphs;
}

/**
 * `**HEADER**` lines become headings, `- ` lines stay bullets, the rest are paragraphs.
 */
export function formatSummaryContent(text: string): string {
    const out: string[] = [];

    for (const raw of text.split('\n')) {
        const line = raw.trim();
        if (!line) {
            out.push('');
        } else if (line.length > 4 && line.startsWith('**') && line.endsWith('**')) {
            out.push('', `## ${line.replace(/^\*+|\*+$/g, '').trim()}`, '');
        } else if (line.startsWith('- ')) {
            out.push(`- ${line.slice(2).trim()}`);
        } else {
            out.push(line);
        }
    }

    return out.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

export class DocumentRenderer implements IDocumentRenderer {
    constructor(
        private readonly fs: IFileManager,
        private readonly outputDir: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    public transcriptPathFor(baseName: string): string {
        return this.fs.joinPaths(this.outputDir, `${baseName}_transcript.md`);
    }

    public summaryPathFor(baseName: string): string {
        return this.fs.joinPaths(this.outputDir, `${baseName}_summary.md`);
    }

    public async renderTranscript(sourceName: string, transcript: string, transcriptLogPath?: string): Promise<string> {
        console.log(`📄 Creating transcript document: ${sourceName}_transcript.md`);

        let body: string;
        if (transcriptLogPath && await this.fs.fileExists(transcriptLogPath)) {
            body = await this.formatDetailedTranscript(transcriptLogPath);
        } else {
            body = splitIntoParagraphs(transcript).join('\n\n');
        }

        const note = transcriptLogPath
            ? `\n_Complete transcript with timestamps: ${path.basename(transcriptLogPath)}_\n`
            : '';

        const outputPath = this.transcriptPathFor(sourceName);
        await this.fs.writeFile(outputPath, this.fill(DocumentKind.TRANSCRIPT, sourceName, body, note));

        console.log('✅ Transcript document created');
        return outputPath;
    }

    public async renderSummary(sourceName: string, summary: string): Promise<string> {
        console.log(`📄 Creating summary document: ${sourceName}_summary.md`);

        const outputPath = this.summaryPathFor(sourceName);
        await this.fs.writeFile(outputPath, this.fill(DocumentKind.SUMMARY, sourceName, formatSummaryContent(summary)));

        console.log('✅ Summary document created');
        return outputPath;
    }

    private async formatDetailedTranscript(transcriptLogPath: string): Promise<string> {
        const logName = path.basename(transcriptLogPath);

        let transcriptText: string;
        try {
            const log = await this.fs.readFile(transcriptLogPath);
            transcriptText = extractTranscript(log) ?? TRANSCRIPT_UNREADABLE;
        } catch (error) {
            console.warn(`⚠️ Could not read transcript log ${logName}:`, error);
            return 'Error reading detailed transcript file';
        }

        const paragraphs = splitIntoParagraphs(transcriptText).join('\n\n');
        return `${paragraphs}\n\n## Detailed Analysis Available\n\n` +
            `_Complete word-level timestamps, speaker identification, and confidence scores ` +
            `are available in the full transcript file: ${logName}_`;
    }

    private fill(kind: DocumentKind, sourceName: string, body: string, note = ''): string {
        return documentTemplates[kind]
            .replace('{{SOURCE}}', () => sourceName)
            .replace('{{DATE}}', () => formatLongDate(this.now()))
            .replace('{{NOTE}}', () => note)
            .replace('{{BODY}}', () => body);
    }
}
