// Import guard for sandboxed code
// Parses the code, rejects module access outside the allow-list, and rewrites imports into bindings

import ts from 'typescript';

// Name of the sandbox global that holds the pre-loaded allowed modules
export const MODULES_GLOBAL = '__modules';

export type GuardOutcome =
  | { ok: true; script: string; modules: string[] }
  | { ok: false; reason: string };

const SOURCE_NAME = 'sandbox.js';

const PARSE_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleDetection: ts.ModuleDetectionKind.Force,
};

function notAllowed(moduleName: string, allowed: readonly string[]): string {
  const permitted = allowed.length > 0 ? allowed.join(', ') : 'none';
  return `Module '${moduleName}' not allowed. Permitted modules: ${permitted}`;
}

function syntaxError(code: string): string | null {
  const { diagnostics = [] } = ts.transpileModule(code, {
    fileName: SOURCE_NAME,
    reportDiagnostics: true,
    compilerOptions: PARSE_OPTIONS,
  });
  const [first] = diagnostics;
  if (!first) return null;

  const message = ts.flattenDiagnosticMessageText(first.messageText, ' ');
  if (first.file && first.start !== undefined) {
    const { line } = first.file.getLineAndCharacterOfPosition(first.start);
    return `${message} (line ${line + 1})`;
  }
  return message;
}

function isExported(node: ts.Node): boolean {
  if (ts.isExportDeclaration(node) || ts.isExportAssignment(node)) return true;
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some(m => m.kind === ts.SyntaxKind.ExportKeyword);
}

// First violation in source order, or null
function findViolation(source: ts.SourceFile, allowed: readonly string[], used: string[]): string | null {
  const use = (moduleName: string): string | null => {
    if (!allowed.includes(moduleName)) return notAllowed(moduleName, allowed);
    if (!used.includes(moduleName)) used.push(moduleName);
    return null;
  };

  const visit = (node: ts.Node): string | null => {
    if (isExported(node)) {
      return 'export statements are not supported';
    }

    if (ts.isImportDeclaration(node)) {
      return ts.isStringLiteral(node.moduleSpecifier)
        ? use(node.moduleSpecifier.text)
        : 'Import source must be a string';
    }

    if (ts.isCallExpression(node)) {
      if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
        return 'Dynamic import() is not allowed';
      }
      if (ts.isIdentifier(node.expression) && node.expression.text === 'require') {
        const [first] = node.arguments;
        if (!first || !ts.isStringLiteralLike(first)) {
          return 'require() needs a string literal module name';
        }
        const violation = use(first.text);
        if (violation) return violation;
      }
    }

    return ts.forEachChild(node, child => visit(child) ?? undefined) ?? null;
  };

  return visit(source);
}

function bindingsFor(node: ts.ImportDeclaration, moduleName: string): string {
  const source = `${MODULES_GLOBAL}[${JSON.stringify(moduleName)}]`;
  const clause = node.importClause;
  if (!clause) return '';

  const statements: string[] = [];
  // Default and namespace imports both bind the module object
  if (clause.name) {
    statements.push(`const ${clause.name.text} = ${source};`);
  }

  const bindings = clause.namedBindings;
  if (bindings) {
    if (ts.isNamespaceImport(bindings)) {
      statements.push(`const ${bindings.name.text} = ${source};`);
    } else if (bindings.elements.length > 0) {
      const named = bindings.elements.map(specifier => {
        const imported = specifier.propertyName ? specifier.propertyName.text : specifier.name.text;
        return `${JSON.stringify(imported)}: ${specifier.name.text}`;
      });
      statements.push(`const { ${named.join(', ')} } = ${source};`);
    }
  }

  return statements.join('');
}

/**
 * Check `code` against the module allow-list.
 *
 * On success the returned script has every import declaration replaced by
 * `const` bindings read from the sandbox's module table. The bindings are hoisted
 * onto the first line and the removed import text is replaced by its newlines,
 * so line numbers in runtime errors still match the submitted code.
 */
export function guardCode(code: string, allowedModules: readonly string[]): GuardOutcome {
  const invalid = syntaxError(code);
  if (invalid) {
    return { ok: false, reason: `Syntax Error: ${invalid}` };
  }

  const source = ts.createSourceFile(SOURCE_NAME, code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS);
  const used: string[] = [];
  const violation = findViolation(source, allowedModules, used);
  if (violation) {
    return { ok: false, reason: `Security Error: ${violation}` };
  }

  const bindings: string[] = [];
  let body = '';
  let cursor = 0;

  for (const node of source.statements) {
    if (!ts.isImportDeclaration(node) || !ts.isStringLiteral(node.moduleSpecifier)) continue;
    const start = node.getStart(source);
    const removed = code.slice(start, node.end);
    body += code.slice(cursor, start) + '\n'.repeat(removed.split('\n').length - 1);
    cursor = node.end;
    bindings.push(bindingsFor(node, node.moduleSpecifier.text));
  }
  body += code.slice(cursor);

  return { ok: true, script: bindings.join('') + body, modules: used };
}
