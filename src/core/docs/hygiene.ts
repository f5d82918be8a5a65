/**
 * Documentation hygiene stage: spec file naming, headings and encoding,
 * plus lightweight README checks.
 *
 * Spec files live flat in the docs root:
 * - numbered sections `NN_slug.md`, first line `# N. Title`
 * - appendices `A<n>_slug.md`, first line `# Appendix X. Title`
 */
import { join, posix } from 'node:path';
import { fileExists, globFiles, readFile, relativePosix } from '../../utils/file-system.js';
import { compareFindings } from '../rules/engine.js';
import type { Finding, RuleDescriptor } from '../rules/types.js';

const SPEC_NAME = /^(?:(\d{2})|A(\d+))_([a-z0-9_]+)\.md$/;
const NUMBERED_H1 = /^#\s*(\d+)\.\s+/;
const APPENDIX_H1 = /^#\s*Appendix\s+[A-Z]\./;
const NUMBERED_HEADING = /^#{2,6}\s+(\d+)\./;

export const DOC_RULES: readonly RuleDescriptor[] = [
  { id: 'doc-empty', family: 'documentation', severity: 'error', description: 'Spec file has no content' },
  { id: 'doc-empty-root', family: 'documentation', severity: 'error', description: 'Docs root contains no spec file' },
  { id: 'doc-encoding', family: 'documentation', severity: 'error', description: 'Encoding replacement character (U+FFFD) in a spec file or README' },
  { id: 'doc-filename', family: 'documentation', severity: 'error', description: 'Spec filename is neither NN_slug.md nor A<n>_slug.md' },
  { id: 'doc-h1-format', family: 'documentation', severity: 'error', description: "First heading is neither '# N. ...' nor '# Appendix X. ...'" },
  { id: 'doc-h1-number', family: 'documentation', severity: 'error', description: 'H1 section number differs from the filename number' },
  { id: 'doc-heading-numbering', family: 'documentation', severity: 'error', description: 'Numbered headings neither carry the H1 number nor start at 1' },
  { id: 'doc-readme-artifacts', family: 'documentation', severity: 'error', description: "Suspicious '??' sequences in README (encoding artifacts)" },
  { id: 'doc-readme-missing', family: 'documentation', severity: 'error', description: 'README.md not found at the repository root' },
];

function docFinding(ruleId: string, file: string, message: string, line: number | null = null): Finding {
  return { ruleId, severity: 'error', file, line, message };
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Check one spec file's text. `fileNumber` is the NN of a numbered section,
 * null for appendices.
 */
export function checkSpecText(file: string, rawText: string, fileNumber: number | null): Finding[] {
  const findings: Finding[] = [];
  const text = stripBom(rawText);

  if (text.includes('\uFFFD')) {
    findings.push(docFinding('doc-encoding', file, 'Encoding replacement character (U+FFFD) found'));
  }

  const lines = text.split(/\r?\n/);
  const h1Index = lines.findIndex((line) => line.trim() !== '');
  const h1 = lines[h1Index];
  if (h1 === undefined) {
    findings.push(docFinding('doc-empty', file, 'Empty file'));
    return findings;
  }

  const numbered = NUMBERED_H1.exec(h1);
  if (!numbered) {
    if (!APPENDIX_H1.test(h1)) {
      findings.push(
        docFinding('doc-h1-format', file, "H1 does not start with a section number (expected '# N. ...' or '# Appendix X. ...')", h1Index + 1)
      );
    }
    return findings;
  }

  const h1Number = Number(numbered[1]);
  if (fileNumber === null) return findings;

  if (h1Number !== fileNumber) {
    findings.push(
      docFinding(
        'doc-h1-number',
        file,
        `H1 section number mismatch (H1=${h1Number}, filename=${String(fileNumber).padStart(2, '0')})`,
        h1Index + 1
      )
    );
  }

  const headings: Array<{ line: number; text: string; n: number }> = [];
  lines.forEach((line, index) => {
    const match = NUMBERED_HEADING.exec(line);
    if (match) headings.push({ line: index + 1, text: line.trim(), n: Number(match[1]) });
  });

  const [first] = headings;
  if (first) {
    const distinct = new Set(headings.map((h) => h.n));
    const prefixed = distinct.size === 1 && distinct.has(h1Number);
    const local = distinct.has(1);
    if (!prefixed && !local) {
      findings.push(
        docFinding(
          'doc-heading-numbering',
          file,
          `Numbered headings do not match H1 number ${h1Number} and do not start at 1 ('${first.text}')`,
          first.line
        )
      );
    }
  }

  return findings;
}

export function checkReadmeText(file: string, rawText: string): Finding[] {
  const findings: Finding[] = [];
  const text = stripBom(rawText);
  if (text.includes('\uFFFD')) {
    findings.push(docFinding('doc-encoding', file, 'Encoding replacement character (U+FFFD) found'));
  }
  if (/\?{2,}/.test(text)) {
    findings.push(docFinding('doc-readme-artifacts', file, "Suspicious '??' sequences found (likely encoding artifacts)"));
  }
  return findings;
}

/**
 * Run every documentation check. Paths in findings are relative to `repoRoot`.
 */
export async function checkDocs(repoRoot: string, docsRoot: string): Promise<Finding[]> {
  const findings: Finding[] = [];
  const docsRel = relativePosix(repoRoot, docsRoot) || '.';

  const specFiles = await globFiles('*.md', { cwd: docsRoot, absolute: false });
  if (specFiles.length === 0) {
    findings.push(docFinding('doc-empty-root', docsRel, `No spec files found in ${docsRel}`));
  }

  for (const name of specFiles) {
    const file = posix.join(docsRel, name);
    const match = SPEC_NAME.exec(name);
    if (!match) {
      findings.push(docFinding('doc-filename', file, 'Invalid spec filename (expected NN_slug.md or A<n>_slug.md)'));
      continue;
    }
    const fileNumber = match[1] !== undefined ? Number(match[1]) : null;
    findings.push(...checkSpecText(file, await readFile(join(docsRoot, name)), fileNumber));
  }

  const readmePath = join(repoRoot, 'README.md');
  if (await fileExists(readmePath)) {
    findings.push(...checkReadmeText('README.md', await readFile(readmePath)));
  } else {
    findings.push(docFinding('doc-readme-missing', 'README.md', 'README.md not found'));
  }

  return findings.sort(compareFindings);
}
