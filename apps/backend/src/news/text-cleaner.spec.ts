import { cleanMarkup } from './text-cleaner';

describe('cleanMarkup()', () => {
  it('should return an empty string for absent input', () => {
    expect(cleanMarkup(undefined)).toBe('');
    expect(cleanMarkup(null)).toBe('');
    expect(cleanMarkup('')).toBe('');
  });

  it('should strip tags and collapse whitespace', () => {
    expect(cleanMarkup('<p>Hello <b>world</b></p>')).toBe('Hello world');
    expect(cleanMarkup('no markup   here\n\n')).toBe('no markup here');
  });

  it('should keep text from adjacent elements apart', () => {
    expect(cleanMarkup('<li>one</li><li>two</li>')).toBe('one two');
  });

  it('should handle feed description markup with entities', () => {
    const markup =
      '<a href="https://example.com/1">AI 기술 동향</a>&nbsp;&nbsp;<font color="#6f6f6f">테스트일보</font>';
    expect(cleanMarkup(markup)).toBe('AI 기술 동향 테스트일보');
  });

  it('should decode escaped characters', () => {
    expect(cleanMarkup('&lt;b&gt; is a tag')).toBe('<b> is a tag');
  });

  it('should tolerate malformed markup', () => {
    expect(cleanMarkup('<div><p>unclosed <b>bold')).toBe('unclosed bold');
    expect(cleanMarkup('<div><p>one</div>two')).toBe('one two');
  });
});
