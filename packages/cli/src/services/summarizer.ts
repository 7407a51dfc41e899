import { GoogleGenAI } from '@google/genai';
import type { IFileManager, ISummaryGenerator } from '../domain/ports';
import { DEFAULT_SUMMARY_PROMPT, TRANSCRIPT_PLACEHOLDER } from '../config/prompts';

export interface SummaryServiceOptions {
  apiKey: string;
  model: string;
  promptTemplatePath: string;
}

export class SummaryService implements ISummaryGenerator {
  private ai: GoogleGenAI;
  private template: string | null = null;

  constructor(
    private readonly fs: IFileManager,
    private readonly options: SummaryServiceOptions
  ) {
    if (!options.apiKey) {
      console.warn('⚠️ GEMINI_API_KEY is missing. Summarization will fail.');
    }
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  /**
   * Reads the prompt template from disk, creating it with the default
   * meeting prompt when the file does not exist yet.
   */
  public async loadPromptTemplate(): Promise<string> {
    if (this.template !== null) return this.template;

    const templatePath = this.options.promptTemplatePath;
    if (await this.fs.fileExists(templatePath)) {
      this.template = await this.fs.readFile(templatePath);
    } else {
      await this.fs.writeFile(templatePath, DEFAULT_SUMMARY_PROMPT);
      console.log(`📝 Created default prompt template: ${templatePath}`);
      this.template = DEFAULT_SUMMARY_PROMPT;
    }

    return this.template;
  }

  public async buildPrompt(transcript: string): Promise<string> {
    const template = await this.loadPromptTemplate();

    if (!template.includes(TRANSCRIPT_PLACEHOLDER)) {
      return `${template}\n\nTRANSCRIPT:\n${transcript}`;
    }
    return template.replaceAll(TRANSCRIPT_PLACEHOLDER, () => transcript);
  }

  public async summarize(transcript: string): Promise<string> {
    if (!transcript || transcript.trim().length === 0) {
      throw new Error('Transcript is empty. Cannot summarize.');
    }

    const prompt = await this.buildPrompt(transcript);
    console.log(`🤖 Generating summary with Gemini [${this.options.model}]...`);

    try {
      const response = await this.ai.models.generateContent({
        model: this.options.model,
        contents: prompt
      });

      if (response.text) {
        console.log('✅ Summary generated successfully');
        return response.text;
      }

      throw new Error('No text returned from Gemini API');
    } catch (error) {
      console.error('❌ Gemini API Error:', error);
      throw new Error(`Gemini Error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
