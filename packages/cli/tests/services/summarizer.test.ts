import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SummaryService } from '../../src/services/summarizer';
import { DEFAULT_SUMMARY_PROMPT } from '../../src/config/prompts';
import { memoryFileSystem } from '../fakes/memoryFileSystem';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => {
  return {
    GoogleGenAI: class {
      models = { generateContent };
    }
  };
});

const TEMPLATE_PATH = '/out/summary_prompt_template.txt';

describe('SummaryService', () => {
  const options = { apiKey: 'test-secret', model: 'gemini-2.5-flash', promptTemplatePath: TEMPLATE_PATH };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('loadPromptTemplate()', () => {
    it('writes the default template when none exists yet', async () => {
      const { files, fs } = memoryFileSystem();
      const service = new SummaryService(fs, options);

      const template = await service.loadPromptTemplate();

      expect(template).toBe(DEFAULT_SUMMARY_PROMPT);
      expect(files.get(TEMPLATE_PATH)).toBe(DEFAULT_SUMMARY_PROMPT);
      expect(console.log).toHaveBeenCalledWith(`📝 Created default prompt template: ${TEMPLATE_PATH}`);
    });

    it('reads an existing template once', async () => {
      const { fs } = memoryFileSystem({ [TEMPLATE_PATH]: 'Notes for {{TRANSCRIPT}}' });
      const service = new SummaryService(fs, options);

      await service.loadPromptTemplate();
      await service.loadPromptTemplate();

      expect(fs.readFile).toHaveBeenCalledTimes(1);
      expect(fs.writeFile).not.toHaveBeenCalled();
    });
  });

  describe('buildPrompt()', () => {
    it('substitutes every placeholder literally', async () => {
      const { fs } = memoryFileSystem({ [TEMPLATE_PATH]: 'A {{TRANSCRIPT}} B {{TRANSCRIPT}}' });
      const service = new SummaryService(fs, options);

      expect(await service.buildPrompt('cost $& up')).toBe('A cost $& up B cost $& up');
    });

    it('appends the transcript to a template without a placeholder', async () => {
      const { fs } = memoryFileSystem({ [TEMPLATE_PATH]: 'Summarize briefly.' });
      const service = new SummaryService(fs, options);

      expect(await service.buildPrompt('hello')).toBe('Summarize briefly.\n\nTRANSCRIPT:\nhello');
    });
  });

  describe('summarize()', () => {
    it('sends the filled prompt to the configured model and returns its text', async () => {
      const { fs } = memoryFileSystem({ [TEMPLATE_PATH]: 'Summarize: {{TRANSCRIPT}}' });
      generateContent.mockResolvedValueOnce({ text: '**Summary**\n- done' });
      const service = new SummaryService(fs, options);

      const summary = await service.summarize('hello');

      expect(summary).toBe('**Summary**\n- done');
      expect(generateContent).toHaveBeenCalledWith({ model: 'gemini-2.5-flash', contents: 'Summarize: hello' });
    });

    it('rejects an empty transcript without calling the API', async () => {
      const { fs } = memoryFileSystem();
      const service = new SummaryService(fs, options);

      await expect(service.summarize('   ')).rejects.toThrow('Transcript is empty. Cannot summarize.');
      expect(generateContent).not.toHaveBeenCalled();
    });

    it('fails when the model returns no text', async () => {
      const { fs } = memoryFileSystem({ [TEMPLATE_PATH]: '{{TRANSCRIPT}}' });
      generateContent.mockResolvedValueOnce({ text: undefined });
      const service = new SummaryService(fs, options);

      await expect(service.summarize('hello')).rejects.toThrow('Gemini Error: No text returned from Gemini API');
    });

    it('wraps API errors', async () => {
      const { fs } = memoryFileSystem({ [TEMPLATE_PATH]: '{{TRANSCRIPT}}' });
      generateContent.mockRejectedValueOnce(new Error('quota exceeded'));
      const service = new SummaryService(fs, options);

      await expect(service.summarize('hello')).rejects.toThrow('Gemini Error: quota exceeded');
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });
});
