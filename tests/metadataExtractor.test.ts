import {
  buildMetadataPrompt,
  EXCERPT_MAX_CHARS,
  generateMetadata,
  METADATA_ERROR_PREFIX,
} from '../server/services/metadataExtractor';
import { FakeTextModel } from './helpers/fakes';

describe('Metadata extractor', () => {
  it('returns the model text verbatim', async () => {
    const model = new FakeTextModel('- Characters: Mira\n- Era: 1950s');

    await expect(generateMetadata(model, 'Some book text')).resolves.toBe('- Characters: Mira\n- Era: 1950s');
  });

  it('sends only the first 1500 characters of the body', async () => {
    const model = new FakeTextModel('ok');
    const body = 'a'.repeat(EXCERPT_MAX_CHARS) + 'TAIL_MARKER';

    await generateMetadata(model, body);

    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]).toContain(`[Book content]\n${'a'.repeat(EXCERPT_MAX_CHARS)}\n`);
    expect(model.prompts[0]).not.toContain('TAIL_MARKER');
  });

  it('lists all seven extraction targets in the prompt', () => {
    const prompt = buildMetadataPrompt('text');
    const targets = prompt.split('\n').filter((line) => line.startsWith('- '));
    expect(targets).toEqual([
      '- Characters / main cast',
      '- Key events and conflict',
      '- Historical era and setting',
      '- Emotional elements (love and hate, loneliness, and so on)',
      '- Screen adaptations (film, drama, webtoon and so on, including the platform name)',
      '- Review (short summary)',
      '- External links (if any)',
    ]);
  });

  it('returns an error string instead of throwing when the model fails', async () => {
    const model = new FakeTextModel(new Error('quota exceeded'));

    const result = await generateMetadata(model, 'text');

    expect(result).toBe(`${METADATA_ERROR_PREFIX}quota exceeded`);
    expect(result.startsWith(METADATA_ERROR_PREFIX)).toBe(true);
  });
});
