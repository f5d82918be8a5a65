/**
 * TypeScript adapter using ts-morph for AST analysis.
 *
 * Files are parsed in an in-memory project; nothing is resolved or
 * type-checked, only syntax is read.
 */
import { posix } from 'node:path';
import { Node, Project, SyntaxKind, ts, type SourceFile } from 'ts-morph';
import type { RawReference } from '../core/model/types.js';
import { failedExtraction, type ExtractionContext, type ExtractionResult, type SyntaxAdapter } from './types.js';
import { DOMAIN_WORD_PATTERN, countCodeLines, lineAt, maskSource, type LexicalSyntax } from './text.js';

const TS_SYNTAX: LexicalSyntax = {
  lineComments: ['//'],
  blockComment: ['/*', '*/'],
  quotes: ['"', "'", '`'],
  backslashEscapes: true,
};

export class TypeScriptAdapter implements SyntaxAdapter {
  readonly dialect = 'typescript';
  readonly extensions = ['.ts', '.tsx', '.mts', '.cts'];

  private project: Project;
  private sequence = 0;

  constructor() {
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        noLib: true,
        noResolve: true,
        jsx: ts.JsxEmit.Preserve,
      },
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
    });
  }

  extract(text: string, context: ExtractionContext): ExtractionResult {
    const nul = text.indexOf('\u0000');
    if (nul !== -1) {
      return failedExtraction({ reason: 'malformed', message: 'binary content (NUL byte)', line: lineAt(text, nul) });
    }

    const declarationOnly = context.filePath.toLowerCase().endsWith('.d.ts');
    const suffix = declarationOnly ? '.d.ts' : context.extension;
    const sourceFile = this.project.createSourceFile(`/scan/file${this.sequence++}${suffix}`, text, {
      overwrite: true,
    });

    try {
      const [diagnostic] = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
      if (diagnostic) {
        const messageText = diagnostic.getMessageText();
        return failedExtraction({
          reason: 'malformed',
          message: typeof messageText === 'string' ? messageText : messageText.getMessageText(),
          line: diagnostic.getLineNumber(),
        });
      }

      return this.analyze(sourceFile, text, declarationOnly);
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  dispose(): void {
    for (const file of this.project.getSourceFiles()) {
      this.project.removeSourceFile(file);
    }
  }

  /**
   * Single pass over the tree for references and signals.
   */
  private analyze(sourceFile: SourceFile, text: string, declarationOnly: boolean): ExtractionResult {
    const references: RawReference[] = [];
    const importedBindings = new Set<string>();
    const addReference = (specifier: string, line: number): void => {
      references.push({ specifier, line, kind: isLocalSpecifier(specifier) ? 'local' : 'system' });
    };

    for (const decl of sourceFile.getImportDeclarations()) {
      addReference(decl.getModuleSpecifierValue(), decl.getStartLineNumber());
      const defaultImport = decl.getDefaultImport();
      if (defaultImport) importedBindings.add(defaultImport.getText());
      const namespaceImport = decl.getNamespaceImport();
      if (namespaceImport) importedBindings.add(namespaceImport.getText());
      for (const named of decl.getNamedImports()) {
        importedBindings.add(named.getAliasNode()?.getText() ?? named.getName());
      }
    }

    for (const decl of sourceFile.getExportDeclarations()) {
      const specifier = decl.getModuleSpecifierValue();
      if (specifier !== undefined) addReference(specifier, decl.getStartLineNumber());
    }

    let branchCount = 0;
    let callCount = 0;
    let domainConditionals = 0;
    let externalFieldAccess = 0;

    sourceFile.forEachDescendant((node) => {
      if (Node.isCallExpression(node)) {
        const callee = node.getExpression();
        const isDynamicImport = callee.getKind() === SyntaxKind.ImportKeyword;
        const isRequire = Node.isIdentifier(callee) && callee.getText() === 'require';
        if (isDynamicImport || isRequire) {
          const [first] = node.getArguments();
          if (first && (Node.isStringLiteral(first) || Node.isNoSubstitutionTemplateLiteral(first))) {
            addReference(first.getLiteralValue(), node.getStartLineNumber());
          }
        } else {
          callCount++;
        }
      } else if (Node.isNewExpression(node)) {
        callCount++;
      } else if (Node.isExternalModuleReference(node)) {
        const expression = node.getExpression();
        if (expression && Node.isStringLiteral(expression)) {
          addReference(expression.getLiteralValue(), node.getStartLineNumber());
        }
      } else if (Node.isIfStatement(node)) {
        branchCount++;
        if (DOMAIN_WORD_PATTERN.test(node.getExpression().getText())) domainConditionals++;
      } else if (Node.isConditionalExpression(node)) {
        branchCount++;
        if (DOMAIN_WORD_PATTERN.test(node.getCondition().getText())) domainConditionals++;
      } else if (Node.isCaseClause(node)) {
        branchCount++;
      } else if (Node.isSwitchStatement(node)) {
        if (DOMAIN_WORD_PATTERN.test(node.getExpression().getText())) domainConditionals++;
      } else if (Node.isPropertyAccessExpression(node)) {
        const target = node.getExpression();
        if (Node.isIdentifier(target) && importedBindings.has(target.getText())) {
          const parent = node.getParent();
          const invoked = Node.isCallExpression(parent) && parent.getExpression() === node;
          if (!invoked) externalFieldAccess++;
        }
      }
    });

    return {
      references,
      signals: {
        codeLines: countCodeLines(maskSource(text, TS_SYNTAX).code),
        branchCount,
        callCount,
        domainConditionals,
        externalFieldAccess,
        declarationOnly,
      },
    };
  }
}

function isLocalSpecifier(specifier: string): boolean {
  return specifier.startsWith('./') || specifier.startsWith('../') || posix.isAbsolute(specifier);
}
