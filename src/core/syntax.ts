import { ImportEdge } from '../types';
import { SyntaxNode } from './parser';

export type DefinitionType = 'function' | 'class';

export interface DefinitionNode {
  type: DefinitionType;
  name: string;
  /** The `function_definition` or `class_definition` node. */
  node: SyntaxNode;
  /** The statement as it appears in its block, decorators included. */
  statement: SyntaxNode;
  decorators: SyntaxNode[];
}

const STRING_PREFIX = /^[rRuUbBfF]*/;

const ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

export function textOf(node: SyntaxNode | null | undefined): string {
  return node ? node.text.trim() : '';
}

export function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

export function endLineOf(node: SyntaxNode): number {
  return node.endPosition.row + 1;
}

export function collapseWhitespace(value: string): string {
  return value
    .replace(/\s+/g, ' ')
    .replace(/([([{]) /g, '$1')
    .replace(/ ([)\]}])/g, '$1')
    .trim();
}

/** Named statements of a module or block, comments excluded. */
export function statementsOf(block: SyntaxNode | null): SyntaxNode[] {
  if (!block) {
    return [];
  }
  return block.namedChildren.filter((child) => child.type !== 'comment');
}

export function unwrapDefinition(statement: SyntaxNode): DefinitionNode | null {
  let node = statement;
  let decorators: SyntaxNode[] = [];

  if (statement.type === 'decorated_definition') {
    const inner = statement.childForFieldName('definition');
    if (!inner) {
      return null;
    }
    node = inner;
    decorators = statement.namedChildren.filter((child) => child.type === 'decorator');
  }

  if (node.type !== 'function_definition' && node.type !== 'class_definition') {
    return null;
  }

  const name = textOf(node.childForFieldName('name'));
  if (!name) {
    return null;
  }

  return {
    type: node.type === 'class_definition' ? 'class' : 'function',
    name,
    node,
    statement,
    decorators,
  };
}

export function topLevelDefinitions(root: SyntaxNode): DefinitionNode[] {
  const out: DefinitionNode[] = [];
  for (const statement of statementsOf(root)) {
    const definition = unwrapDefinition(statement);
    if (definition) {
      out.push(definition);
    }
  }
  return out;
}

export function classMethods(classNode: SyntaxNode): DefinitionNode[] {
  return statementsOf(classNode.childForFieldName('body'))
    .map((statement) => unwrapDefinition(statement))
    .filter((definition): definition is DefinitionNode => definition !== null && definition.type === 'function');
}

export function findTopLevelDefinition(root: SyntaxNode, name: string, type?: DefinitionType): DefinitionNode | null {
  let found: DefinitionNode | null = null;
  for (const definition of topLevelDefinitions(root)) {
    if (definition.name === name && (!type || definition.type === type)) {
      found = definition;
    }
  }
  return found;
}

function assignmentTargets(assignment: SyntaxNode): string[] {
  const names: string[] = [];
  let current: SyntaxNode | null = assignment;
  while (current && current.type === 'assignment') {
    const left = current.childForFieldName('left');
    if (left?.type === 'identifier') {
      names.push(left.text);
    }
    current = current.childForFieldName('right');
  }
  return names;
}

/** Names bound by plain (optionally annotated) top-level assignments. */
export function assignedNames(statement: SyntaxNode): string[] {
  if (statement.type !== 'expression_statement') {
    return [];
  }
  const names: string[] = [];
  for (const child of statement.namedChildren) {
    if (child.type === 'assignment') {
      names.push(...assignmentTargets(child));
    }
  }
  return names;
}

export function hasTopLevelVariable(root: SyntaxNode, name: string): boolean {
  return statementsOf(root).some((statement) => assignedNames(statement).includes(name));
}

/**
 * Dotted name of an identifier or attribute chain. Subscripts (`Base[T]`)
 * and calls (`@decorator(arg)`) are looked through.
 */
export function dottedNameOf(node: SyntaxNode | null): string | null {
  if (!node) {
    return null;
  }
  switch (node.type) {
    case 'identifier':
      return node.text;
    case 'attribute': {
      const object = dottedNameOf(node.childForFieldName('object'));
      const attribute = node.childForFieldName('attribute');
      if (!object || !attribute) {
        return null;
      }
      return `${object}.${attribute.text}`;
    }
    case 'subscript':
      return dottedNameOf(node.childForFieldName('value'));
    case 'call':
      return dottedNameOf(node.childForFieldName('function'));
    case 'parenthesized_expression':
      return dottedNameOf(node.namedChildren.find((child) => child.type !== 'comment') ?? null);
    default:
      return null;
  }
}

export function baseClassExpressions(classNode: SyntaxNode): SyntaxNode[] {
  const superclasses = classNode.childForFieldName('superclasses');
  if (!superclasses) {
    return [];
  }
  return superclasses.namedChildren.filter(
    (child) =>
      child.type !== 'keyword_argument' &&
      child.type !== 'list_splat' &&
      child.type !== 'dictionary_splat' &&
      child.type !== 'comment',
  );
}

export function baseClassNames(classNode: SyntaxNode): string[] {
  const names: string[] = [];
  for (const base of baseClassExpressions(classNode)) {
    const name = dottedNameOf(base);
    if (name) {
      names.push(name);
    }
  }
  return names;
}

export function decoratorExpression(decorator: SyntaxNode): SyntaxNode | null {
  return decorator.namedChildren.find((child) => child.type !== 'comment') ?? null;
}

function unescapeLiteral(value: string): string {
  return value.replace(/\\(\r?\n|.)/g, (match, escaped: string) => {
    if (escaped === '\n' || escaped === '\r\n') {
      return '';
    }
    return ESCAPES[escaped] ?? match;
  });
}

/** Value of a plain string literal; `null` for f-strings and bytes. */
export function stringLiteralValue(node: SyntaxNode): string | null {
  if (node.type === 'concatenated_string') {
    let joined = '';
    for (const part of node.namedChildren) {
      if (part.type === 'comment') {
        continue;
      }
      const value = stringLiteralValue(part);
      if (value === null) {
        return null;
      }
      joined += value;
    }
    return joined;
  }

  if (node.type !== 'string') {
    return null;
  }

  const text = node.text;
  const prefix = (STRING_PREFIX.exec(text)?.[0] ?? '').toLowerCase();
  if (prefix.includes('f') || prefix.includes('b')) {
    return null;
  }

  const body = text.slice(prefix.length);
  const quote = body.startsWith('"""') || body.startsWith("'''") ? body.slice(0, 3) : body.slice(0, 1);
  const inner = body.slice(quote.length, body.length - quote.length);
  return prefix.includes('r') ? inner : unescapeLiteral(inner);
}

/** Docstring of a function or class body: the first statement, if it is a bare string. */
export function docstringOf(definition: SyntaxNode): string | null {
  const [first] = statementsOf(definition.childForFieldName('body'));
  if (!first || first.type !== 'expression_statement') {
    return null;
  }
  const expressions = first.namedChildren.filter((child) => child.type !== 'comment');
  if (expressions.length !== 1) {
    return null;
  }
  return stringLiteralValue(expressions[0]);
}

function parseModuleName(moduleNode: SyntaxNode | null): { module: string | null; level: number } {
  if (!moduleNode) {
    return { module: null, level: 0 };
  }
  if (moduleNode.type !== 'relative_import') {
    return { module: moduleNode.text, level: 0 };
  }

  const prefix = moduleNode.namedChildren.find((child) => child.type === 'import_prefix');
  const dotted = moduleNode.namedChildren.find((child) => child.type === 'dotted_name');
  return {
    module: dotted ? dotted.text : null,
    level: prefix ? prefix.text.replace(/\s+/g, '').length : 0,
  };
}

function importedNames(nameNode: SyntaxNode): { original: string; alias: string | null } | null {
  if (nameNode.type === 'aliased_import') {
    const original = textOf(nameNode.childForFieldName('name'));
    const alias = textOf(nameNode.childForFieldName('alias'));
    return original ? { original, alias: alias || null } : null;
  }
  if (nameNode.type === 'dotted_name' || nameNode.type === 'identifier') {
    return { original: nameNode.text, alias: null };
  }
  return null;
}

/** Import statements at module level, in declaration order. */
export function collectImports(root: SyntaxNode, importingFile: string): ImportEdge[] {
  const edges: ImportEdge[] = [];

  for (const statement of statementsOf(root)) {
    if (statement.type === 'import_statement') {
      for (const nameNode of statement.childrenForFieldName('name')) {
        const names = importedNames(nameNode);
        if (!names) {
          continue;
        }
        edges.push({
          importingFile,
          alias: names.alias ?? names.original,
          sourceModule: names.original,
          originalName: names.original,
          level: 0,
          isWildcard: false,
          isModuleImport: true,
        });
      }
      continue;
    }

    if (statement.type !== 'import_from_statement') {
      continue;
    }

    const { module, level } = parseModuleName(statement.childForFieldName('module_name'));

    if (statement.namedChildren.some((child) => child.type === 'wildcard_import')) {
      edges.push({
        importingFile,
        alias: '*',
        sourceModule: module,
        originalName: '*',
        level,
        isWildcard: true,
        isModuleImport: false,
      });
      continue;
    }

    for (const nameNode of statement.childrenForFieldName('name')) {
      const names = importedNames(nameNode);
      if (!names) {
        continue;
      }
      edges.push({
        importingFile,
        alias: names.alias ?? names.original,
        sourceModule: module,
        originalName: names.original,
        level,
        isWildcard: false,
        isModuleImport: false,
      });
    }
  }

  return edges;
}
