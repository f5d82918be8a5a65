import { describe, it, expect } from 'vitest';
import {
  C_LIKE_SYNTAX,
  countCalls,
  countCodeLines,
  countDomainConditionals,
  countExternalFieldAccess,
  findPlatformCalls,
  findPrefixedIdentifiers,
  lineAt,
  maskSource,
} from '../../../src/adapters/text.js';

describe('maskSource', () => {
  it('blanks comments and literal contents but keeps newlines', () => {
    const masked = maskSource('a // c\n"x/*y" /* z */ b', C_LIKE_SYNTAX);
    expect(masked.withoutComments).toBe(`a${' '.repeat(5)}\n"x/*y"${' '.repeat(9)}b`);
    expect(masked.code).toBe(`a${' '.repeat(5)}\n"    "${' '.repeat(9)}b`);
    expect(masked.unterminatedBlockLine).toBeNull();
  });

  it('honors backslash escapes inside literals', () => {
    const masked = maskSource('"a\\"b" c', C_LIKE_SYNTAX);
    expect(masked.code).toBe('"    " c');
    expect(masked.withoutComments).toBe('"a\\"b" c');
  });

  it('reports where an unterminated block comment opens', () => {
    expect(maskSource('int a;\n\n/* open\nint b;', C_LIKE_SYNTAX).unterminatedBlockLine).toBe(3);
  });

  it('treats doubled quotes as escapes when backslashes are not', () => {
    const masked = maskSource('x = "a""b" \' note', {
      lineComments: ["'"],
      quotes: ['"'],
      backslashEscapes: false,
    });
    expect(masked.code).toBe(`x = "    "${' '.repeat(7)}`);
  });
});

describe('line helpers', () => {
  it('maps offsets to 1-based lines', () => {
    expect(lineAt('a\nb\nc', 0)).toBe(1);
    expect(lineAt('a\nb\nc', 4)).toBe(3);
  });

  it('counts non-blank lines', () => {
    expect(countCodeLines('a\n\n  \nb\n#x', /^#/)).toBe(2);
  });
});

describe('countCalls', () => {
  it('counts call sites but not declarations or keywords', () => {
    const code = 'x = foo(1) + bar (2);\nvoid baz(void);\nif (x) return qux();';
    expect(countCalls(code, new Set(['if', 'void']))).toBe(3);
  });

  it('counts statement calls at line start when asked', () => {
    expect(countCalls('Sub Run()\n  LogIt(1)\nEnd Sub', new Set(['sub']), {
      caseInsensitive: true,
      lineStatements: true,
    })).toBe(1);
  });
});

describe('signal helpers', () => {
  it('counts conditionals that test domain values', () => {
    const code = 'if (mode) x;\nwhile (state) y;\nif (n > 0) z;';
    expect(countDomainConditionals(code, ['if'])).toBe(1);
  });

  it('finds prefixed identifiers once each, skipping excluded names', () => {
    const code = 'svc_log_write(); HAL_uart_init();\nsvc_log_write(); ida_alpha();';
    expect(findPrefixedIdentifiers(code, new Set(['ida_alpha']))).toEqual([
      { name: 'svc_log_write', line: 1 },
      { name: 'HAL_uart_init', line: 1 },
    ]);
  });

  it('counts field accesses into other modules but not calls', () => {
    expect(countExternalFieldAccess('hal_uart->regs = 1; cfg_limits.max; svc_log.write(x);')).toBe(2);
  });
});

describe('findPlatformCalls', () => {
  it('finds watched calls once per API and line', () => {
    const code = [
      'Thread.Sleep(10); Thread.Sleep(20);',
      'form.BeginInvoke(x); form.Invoke (y);',
      'Process.Start(a); MessageBox.Show(m);',
      'Sleep(1);',
    ].join('\n');

    expect(findPlatformCalls(code)).toEqual([
      { specifier: 'Thread.Sleep', line: 1, kind: 'call' },
      { specifier: 'Control.Invoke', line: 2, kind: 'call' },
      { specifier: 'Control.BeginInvoke', line: 2, kind: 'call' },
      { specifier: 'MessageBox.Show', line: 3, kind: 'call' },
      { specifier: 'Process.Start', line: 3, kind: 'call' },
    ]);
  });
});
