import {
  compileTemplate,
  compileTemplateOrThrow,
  matchesPattern,
  escapeLiteral,
} from '../template';
import { CompileError } from '../errors';

describe('compileTemplate', () => {
  test('compiles a fragment into an anchored capture group', () => {
    const result = compileTemplate('users:<[0-9]+>');
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.pattern).toBe('^users:([0-9]+)$');
    expect(result.regex.test('users:123')).toBe(true);
    expect(result.regex.test('users:12a')).toBe(false);
    expect(result.regex.test('xusers:123')).toBe(false);
    expect(result.regex.test('users:123:profile')).toBe(false);
  });

  test('keeps literal text after the fragment', () => {
    expect(compileTemplateOrThrow('users:<.+>:posts')).toBe('^users:(.+):posts$');
  });

  test('escapes regex metacharacters outside fragments', () => {
    const pattern = compileTemplateOrThrow('articles.1');
    expect(pattern).toBe('^articles\\.1$');
    expect(matchesPattern(pattern, 'articles.1')).toBe(true);
    expect(matchesPattern(pattern, 'articlesX1')).toBe(false);

    expect(compileTemplateOrThrow('cost:$5(+tax)')).toBe('^cost:\\$5\\(\\+tax\\)$');
  });

  test('a template without fragments matches only itself', () => {
    const pattern = compileTemplateOrThrow('view');
    expect(pattern).toBe('^view$');
    expect(matchesPattern(pattern, 'view')).toBe(true);
    expect(matchesPattern(pattern, 'review')).toBe(false);
  });

  test('handles several fragments', () => {
    const pattern = compileTemplateOrThrow('<[a-z]+>:<[0-9]+>');
    expect(pattern).toBe('^([a-z]+):([0-9]+)$');
    expect(matchesPattern(pattern, 'users:42')).toBe(true);
  });

  test('only the outermost delimiter pair opens a fragment', () => {
    const pattern = compileTemplateOrThrow('tag:<[a-z]<x>>');
    expect(pattern).toBe('^tag:([a-z]<x>)$');
    expect(matchesPattern(pattern, 'tag:a<x>')).toBe(true);
  });

  test('supports custom delimiters', () => {
    expect(compileTemplateOrThrow('users:{[0-9]+}', '{', '}')).toBe('^users:([0-9]+)$');
    // with custom delimiters the default ones are plain text
    expect(compileTemplateOrThrow('a<b>', '{', '}')).toBe('^a<b>$');
  });

  test('fails on an unterminated start delimiter', () => {
    const result = compileTemplate('users:<unterminated');
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(CompileError);
    expect(result.error.code).toBe('COMPILE_ERROR');
    expect(result.error.template).toBe('users:<unterminated');
    expect(result.error.message).toBe(
      'Cannot compile template "users:<unterminated": unterminated "<" at offset 6'
    );
  });

  test('fails on a stray end delimiter', () => {
    const result = compileTemplate('a>b');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Cannot compile template "a>b": unexpected ">" at offset 1');
  });

  test('fails on an invalid fragment', () => {
    const result = compileTemplate('users:<[0-9+>');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CompileError);
    expect(result.error.message).toContain('invalid fragment "[0-9+"');
  });

  test('rejects multi-character or identical delimiters', () => {
    expect(compileTemplate('a', '<<', '>').ok).toBe(false);
    expect(compileTemplate('a', '|', '|').ok).toBe(false);
  });

  test('rejects named groups, which PostgreSQL cannot run', () => {
    const result = compileTemplate('users:<(?<id>[0-9]+)>');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CompileError);
    expect(result.error.message).toBe(
      'Cannot compile template "users:<(?<id>[0-9]+)>": invalid fragment "(?<id>[0-9]+)": named groups are not supported'
    );
  });

  test('rejects escapes that JavaScript and PostgreSQL read differently', () => {
    for (const template of ['<\\p{L}+>', '<(a)\\k<x>>', '<\\bword\\b>', '<a\\y>']) {
      const result = compileTemplate(template);
      expect(result.ok).toBe(false);
    }
    const result = compileTemplate('<\\p{L}+>');
    if (result.ok) return;
    expect(result.error.message).toBe('Cannot compile template "<\\p{L}+>": invalid fragment "\\p{L}+": unsupported escape "\\p"');
  });

  test('accepts portable escapes and lookarounds', () => {
    expect(compileTemplateOrThrow('users:<\\d+>')).toBe('^users:(\\d+)$');
    expect(compileTemplateOrThrow('{(?<=a)b}', '{', '}')).toBe('^((?<=a)b)$');
    expect(compileTemplateOrThrow('<(?!x)[a-z]+>')).toBe('^((?!x)[a-z]+)$');
    expect(compileTemplateOrThrow('<\\.>')).toBe('^(\\.)$');
  });

  test('accepts delimiters outside the Basic Multilingual Plane', () => {
    const start = '\u{1D538}';
    const end = '\u{1D539}';
    const pattern = compileTemplateOrThrow(`users:${start}[0-9]+${end}`, start, end);
    expect(pattern).toBe('^users:([0-9]+)$');
    expect(matchesPattern(pattern, 'users:42')).toBe(true);
  });

  test('reports offsets of astral delimiters in UTF-16 units', () => {
    const result = compileTemplate('\u{1F600}\u{1D538}x', '\u{1D538}', '\u{1D539}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Cannot compile template "\u{1F600}\u{1D538}x": unterminated "\u{1D538}" at offset 2');
  });

  test('is deterministic', () => {
    expect(compileTemplateOrThrow('users:<.+>')).toBe(compileTemplateOrThrow('users:<.+>'));
  });
});

describe('compileTemplateOrThrow', () => {
  test('throws the CompileError', () => {
    expect(() => compileTemplateOrThrow('users:<')).toThrow(CompileError);
  });
});

describe('escapeLiteral', () => {
  test('escapes every metacharacter', () => {
    expect(escapeLiteral('\\.+*?()|[]{}^$')).toBe('\\\\\\.\\+\\*\\?\\(\\)\\|\\[\\]\\{\\}\\^\\$');
  });

  test('leaves ordinary text alone', () => {
    expect(escapeLiteral('users:alice-1/posts')).toBe('users:alice-1/posts');
  });
});
