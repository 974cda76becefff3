import { SyntaxNode } from './parser';
import { collapseWhitespace, textOf } from './syntax';

function expressionText(node: SyntaxNode | null): string {
  return node ? collapseWhitespace(node.text) : '';
}

function firstNamed(node: SyntaxNode): SyntaxNode | null {
  return node.namedChildren.find((child) => child.type !== 'comment') ?? null;
}

function splatText(node: SyntaxNode, stars: string): string {
  const inner = firstNamed(node);
  return `${stars}${inner ? inner.text : ''}`;
}

function parameterText(node: SyntaxNode): string | null {
  switch (node.type) {
    case 'identifier':
      return node.text;
    case 'list_splat_pattern':
      return splatText(node, '*');
    case 'dictionary_splat_pattern':
      return splatText(node, '**');
    case 'keyword_separator':
      return '*';
    case 'positional_separator':
      return '/';
    case 'typed_parameter': {
      const target = firstNamed(node);
      const targetText = target ? parameterText(target) : null;
      if (!targetText) {
        return null;
      }
      return `${targetText}: ${expressionText(node.childForFieldName('type'))}`;
    }
    case 'default_parameter':
      return `${expressionText(node.childForFieldName('name'))}=${expressionText(node.childForFieldName('value'))}`;
    case 'typed_default_parameter':
      return `${textOf(node.childForFieldName('name'))}: ${expressionText(node.childForFieldName('type'))} = ${expressionText(
        node.childForFieldName('value'),
      )}`;
    case 'comment':
      return null;
    default:
      return expressionText(node);
  }
}

function typeParameters(node: SyntaxNode): string {
  const params = node.childForFieldName('type_parameters');
  return params ? expressionText(params) : '';
}

function isAsync(node: SyntaxNode): boolean {
  return node.children.some((child) => child.type === 'async');
}

export function functionSignature(node: SyntaxNode): string {
  const name = textOf(node.childForFieldName('name'));
  const parameters = node.childForFieldName('parameters');
  const params = parameters
    ? parameters.namedChildren.map((child) => parameterText(child)).filter((text): text is string => text !== null)
    : [];
  const returnType = node.childForFieldName('return_type');

  let signature = `${isAsync(node) ? 'async ' : ''}def ${name}${typeParameters(node)}(${params.join(', ')})`;
  if (returnType) {
    signature += ` -> ${expressionText(returnType)}`;
  }
  return signature;
}

export function classSignature(node: SyntaxNode): string {
  const name = textOf(node.childForFieldName('name'));
  const superclasses = node.childForFieldName('superclasses');
  const args = superclasses
    ? superclasses.namedChildren.filter((child) => child.type !== 'comment').map((child) => expressionText(child))
    : [];

  let signature = `class ${name}${typeParameters(node)}`;
  if (args.length > 0) {
    signature += `(${args.join(', ')})`;
  }
  return signature;
}

/** Last line of a definition's header, up to the colon that opens its body. */
export function headerEndRow(node: SyntaxNode): number {
  let last = node.childForFieldName('name') ?? node;
  for (const field of ['type_parameters', 'parameters', 'return_type', 'superclasses']) {
    const child = node.childForFieldName(field);
    if (child && child.endIndex > last.endIndex) {
      last = child;
    }
  }
  return last.endPosition.row + 1;
}
