import { extractJson, extractTaggedSection } from './response-parser';

describe('extractJson', () => {
  it('extracts the fenced block and ignores surrounding prose', () => {
    const text = [
      '<observation>A dialog with {braces} in its title</observation>',
      '```json',
      '{"action": "CLICK", "target": "OK", "coordinates": {"x": 500, "y": 500}}',
      '```',
      'Done {maybe}.',
    ].join('\n');

    expect(extractJson(text)).toEqual({
      action: 'CLICK',
      target: 'OK',
      coordinates: { x: 500, y: 500 },
    });
  });

  it('falls back to the outermost brace span without fences', () => {
    const text =
      'I will press enter now. {"action": "PRESS", "key": "enter"} That is all.';

    expect(extractJson(text)).toEqual({ action: 'PRESS', key: 'enter' });
  });

  it('uses the brace span when the fenced block is not valid JSON', () => {
    const text = '```\nnot json\n```\n{"task_complete": true}';

    expect(extractJson(text)).toEqual({ task_complete: true });
  });

  it('tries every fenced block before the brace span', () => {
    const text = [
      'First I would call the helper:',
      '```js',
      '{ run(); }',
      '```',
      '```json',
      '{"action": "CLICK", "target": "OK", "coordinates": {"x": 1, "y": 2}}',
      '```',
    ].join('\n');

    expect(extractJson(text)).toEqual({
      action: 'CLICK',
      target: 'OK',
      coordinates: { x: 1, y: 2 },
    });
  });

  it('returns null when there is no JSON at all', () => {
    expect(extractJson('The screen is blank.')).toBeNull();
    expect(extractJson('{ broken')).toBeNull();
    expect(extractJson('')).toBeNull();
  });

  it('ignores JSON that is not an object', () => {
    expect(extractJson('```json\n[1, 2, 3]\n```')).toBeNull();
  });
});

describe('extractTaggedSection', () => {
  it('returns the trimmed section content', () => {
    const text = '<observation>\n  Notepad is open.\n</observation>';
    expect(extractTaggedSection(text, 'observation')).toBe('Notepad is open.');
  });

  it('returns null for missing or empty sections', () => {
    expect(extractTaggedSection('no tags', 'reasoning')).toBeNull();
    expect(extractTaggedSection('<reasoning> </reasoning>', 'reasoning')).toBeNull();
  });
});
