import { describe, it, expect } from 'vitest';
import { buildPrompt, createPromptSpec, describeShape, renderPrompt } from './prompt-builder.js';
import { arrayShape, objectShape } from './shapes.js';
import { assistantPrompts } from '../config.js';
import { InvalidArgumentError } from './errors.js';

describe('buildPrompt', () => {
  it('joins instruction, content and schema hint', () => {
    expect(buildPrompt('Identify issues.', 'The tenant pays rent.', '{"issues": []}')).toBe(
      'Identify issues.\n\nThe tenant pays rent.\n\nRespond as JSON matching: {"issues": []}'
    );
  });

  it('omits the hint line without a hint', () => {
    expect(buildPrompt('  Summarize.  ', 'text')).toBe('Summarize.\n\ntext');
  });

  it('serializes structured content as indented JSON', () => {
    expect(buildPrompt('Review.', { parties: ['A', 'B'] })).toBe(
      'Review.\n\n{\n  "parties": [\n    "A",\n    "B"\n  ]\n}'
    );
  });

  it('rejects an empty instruction', () => {
    expect(() => buildPrompt('   ', 'text')).toThrow(InvalidArgumentError);
  });

  it('is deterministic', () => {
    expect(buildPrompt('Analyze.', 'x', 'hint')).toBe(buildPrompt('Analyze.', 'x', 'hint'));
  });

  describe('reasoning scaffold', () => {
    const longText = 'The supplier shall deliver goods monthly. '.repeat(10);

    it('is appended to long analytical prompts when enabled', () => {
      const prompt = buildPrompt('Analyze this contract.', longText, undefined, { reasoningScaffold: true });
      expect(prompt.endsWith(`\n\n${assistantPrompts.reasoningScaffold}`)).toBe(true);
    });

    it('is not appended when disabled', () => {
      const prompt = buildPrompt('Analyze this contract.', longText);
      expect(prompt).toBe(`Analyze this contract.\n\n${longText}`);
    });

    it('is not appended to short prompts', () => {
      const prompt = buildPrompt('Analyze.', 'short', undefined, { reasoningScaffold: true });
      expect(prompt).toBe('Analyze.\n\nshort');
    });

    it('is not appended without an analytical verb', () => {
      const prompt = buildPrompt('Summarize this contract.', longText, undefined, { reasoningScaffold: true });
      expect(prompt).toBe(`Summarize this contract.\n\n${longText}`);
    });
  });
});

describe('createPromptSpec', () => {
  it('creates a frozen spec', () => {
    const spec = createPromptSpec('Identify issues.', 'text', '{"issues": []}');
    expect(spec).toEqual({ instruction: 'Identify issues.', inputPayload: 'text', schemaHint: '{"issues": []}' });
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('leaves out an absent schema hint', () => {
    expect('schemaHint' in createPromptSpec('Summarize.', 'text')).toBe(false);
  });

  it('rejects an empty instruction', () => {
    expect(() => createPromptSpec('', 'text')).toThrow('Prompt instruction must not be empty');
  });

  it('renders the same prompt as buildPrompt', () => {
    const spec = createPromptSpec('Identify issues.', 'text', 'hint');
    expect(renderPrompt(spec)).toBe(buildPrompt('Identify issues.', 'text', 'hint'));
  });
});

describe('describeShape', () => {
  it('describes arrays', () => {
    expect(describeShape(arrayShape())).toBe('a JSON array');
  });

  it('uses defaults and placeholders for object keys', () => {
    const shape = objectShape({ requiredKeys: ['title', 'sections'], defaultValues: { sections: [] } });
    expect(describeShape(shape)).toBe('{"title":"...","sections":[]}');
  });
});
