import { printBlockString } from 'graphql/language/blockString.js';
import { printString } from 'graphql/language/printString.js';

import type { ASTNode } from './ast.js';
import { Kind } from './kinds.js';

const MAX_LINE_LENGTH = 80;

/**
 * Converts an AST into a string, using one set of reasonable
 * formatting rules.
 */
export function print(node: ASTNode): string {
  switch (node.kind) {
    case Kind.NAME:
      return node.value;
    case Kind.VARIABLE:
      return '$' + print(node.name);

    // Document

    case Kind.DOCUMENT:
      return printAll(node.definitions).join('\n\n');
    case Kind.OPERATION_DEFINITION: {
      const varDefs = wrap(
        '(',
        join(printAll(node.variableDefinitions), ', '),
        ')',
      );
      const prefix = join(
        [
          node.operation,
          join([maybePrint(node.name), varDefs]),
          join(printAll(node.directives), ' '),
        ],
        ' ',
      );

      // Anonymous queries with no directives or variable definitions can use
      // the query short form.
      return (
        (prefix === 'query' ? '' : prefix + ' ') + print(node.selectionSet)
      );
    }
    case Kind.VARIABLE_DEFINITION:
      return (
        print(node.variable) +
        ': ' +
        print(node.type) +
        wrap(' = ', maybePrint(node.defaultValue)) +
        wrap(' ', join(printAll(node.directives), ' '))
      );
    case Kind.SELECTION_SET:
      return block(printAll(node.selections));
    case Kind.FIELD: {
      const prefix = wrap('', maybePrint(node.alias), ': ') + print(node.name);
      const args = printAll(node.arguments);
      let argsLine = prefix + wrap('(', join(args, ', '), ')');

      if (argsLine.length > MAX_LINE_LENGTH) {
        argsLine = prefix + wrap('(\n', indent(join(args, '\n')), '\n)');
      }

      return join(
        [
          argsLine + maybePrint(node.nullabilityAssertion),
          join(printAll(node.directives), ' '),
          maybePrint(node.selectionSet),
        ],
        ' ',
      );
    }
    case Kind.ARGUMENT:
      return print(node.name) + ': ' + print(node.value);

    // Nullability Modifiers

    case Kind.LIST_NULLABILITY:
      return '[' + maybePrint(node.element) + ']';
    case Kind.REQUIRED_MODIFIER:
      return maybePrint(node.element) + '!';
    case Kind.OPTIONAL_MODIFIER:
      return maybePrint(node.element) + '?';

    // Fragments

    case Kind.FRAGMENT_SPREAD:
      return (
        '...' +
        print(node.name) +
        wrap(' ', join(printAll(node.directives), ' '))
      );
    case Kind.INLINE_FRAGMENT:
      return join(
        [
          '...',
          wrap('on ', maybePrint(node.typeCondition)),
          join(printAll(node.directives), ' '),
          print(node.selectionSet),
        ],
        ' ',
      );
    case Kind.FRAGMENT_DEFINITION:
      return (
        `fragment ${print(node.name)}${wrap(
          '(',
          join(printAll(node.variableDefinitions ?? []), ', '),
          ')',
        )} ` +
        `on ${print(node.typeCondition)} ${wrap(
          '',
          join(printAll(node.directives), ' '),
          ' ',
        )}` +
        print(node.selectionSet)
      );

    // Value

    case Kind.INT:
    case Kind.FLOAT:
    case Kind.ENUM:
      return node.value;
    case Kind.STRING:
      return node.block
        ? printBlockString(node.value)
        : printString(node.value);
    case Kind.BOOLEAN:
      return node.value ? 'true' : 'false';
    case Kind.NULL:
      return 'null';
    case Kind.LIST:
      return '[' + join(printAll(node.values), ', ') + ']';
    case Kind.OBJECT:
      return '{' + join(printAll(node.fields), ', ') + '}';
    case Kind.OBJECT_FIELD:
      return print(node.name) + ': ' + print(node.value);

    // Directive

    case Kind.DIRECTIVE:
      return (
        '@' +
        print(node.name) +
        wrap('(', join(printAll(node.arguments), ', '), ')')
      );

    // Type

    case Kind.NAMED_TYPE:
      return print(node.name);
    case Kind.LIST_TYPE:
      return '[' + print(node.type) + ']';
    case Kind.NON_NULL_TYPE:
      return print(node.type) + '!';
  }

  const unexpected: never = node;
  throw new Error('Unexpected node: ' + String(unexpected));
}

function printAll(nodes: ReadonlyArray<ASTNode>): Array<string> {
  return nodes.map(print);
}

function maybePrint(node: ASTNode | undefined): string {
  return node === undefined ? '' : print(node);
}

/**
 * Joins the non-empty strings of array with separator.
 */
function join(array: ReadonlyArray<string>, separator = ''): string {
  return array.filter((x) => x !== '').join(separator);
}

/**
 * Given array, print each item on its own line, wrapped in an indented `{ }` block.
 */
function block(array: ReadonlyArray<string>): string {
  return wrap('{\n', indent(join(array, '\n')), '\n}');
}

/**
 * If maybeString is not null or empty, then wrap with start and end, otherwise print an empty string.
 */
function wrap(start: string, maybeString: string, end = ''): string {
  return maybeString !== '' ? start + maybeString + end : '';
}

function indent(str: string): string {
  return wrap('  ', str.replaceAll('\n', '\n  '));
}
