import type { Source } from 'graphql';
import { GraphQLError } from 'graphql';

import type { Location, Token } from '../language/ast.js';
import type { TokenKind } from '../language/tokenKind.js';

export interface CompilerErrorOptions {
  source?: Source;
  positions?: ReadonlyArray<number>;
  path?: ReadonlyArray<string | number>;
}

/**
 * Points an error at the source position of a node, when it has one.
 */
export function locatedAt(node: {
  readonly loc?: Location;
}): CompilerErrorOptions {
  return node.loc === undefined
    ? {}
    : { source: node.loc.source, positions: [node.loc.start] };
}

/**
 * Base class of every error the compiler raises. `code` is stable and is
 * repeated in `extensions.code`.
 */
export class CompilerError extends GraphQLError {
  readonly code: string;

  constructor(code: string, message: string, options?: CompilerErrorOptions) {
    super(message, {
      source: options?.source,
      positions: options?.positions,
      path: options?.path,
      extensions: { code },
    });
    this.code = code;
    this.name = new.target.name;
  }
}

export class LexicalError extends CompilerError {
  constructor(source: Source, position: number, description: string) {
    super('LEXICAL_ERROR', `Syntax Error: ${description}`, {
      source,
      positions: [position],
    });
  }
}

export class GraphQLSyntaxError extends CompilerError {
  readonly expected: TokenKind | string | undefined;
  readonly token: Token;

  constructor(
    source: Source,
    token: Token,
    description: string,
    expected?: TokenKind | string,
  ) {
    super('SYNTAX_ERROR', `Syntax Error: ${description}`, {
      source,
      positions: [token.start],
    });
    this.expected = expected;
    this.token = token;
  }
}

export class DepthLimitError extends CompilerError {
  readonly maxDepth: number;

  constructor(source: Source, position: number, maxDepth: number) {
    super(
      'DEPTH_LIMIT_EXCEEDED',
      `Syntax Error: Document nesting exceeds the maximum depth of ${maxDepth}.`,
      { source, positions: [position] },
    );
    this.maxDepth = maxDepth;
  }
}

export class FragmentNotFoundError extends CompilerError {
  readonly fragmentName: string;

  constructor(fragmentName: string, options?: CompilerErrorOptions) {
    super('FRAGMENT_NOT_FOUND', `Unknown fragment "${fragmentName}".`, options);
    this.fragmentName = fragmentName;
  }
}

/**
 * `cycle` starts and ends with the fragment that spreads itself, e.g.
 * `['A', 'B', 'A']`.
 */
export class CyclicFragmentError extends CompilerError {
  readonly cycle: ReadonlyArray<string>;

  constructor(cycle: ReadonlyArray<string>, options?: CompilerErrorOptions) {
    const via = cycle.slice(1, -1).map((name) => `"${name}"`);
    super(
      'CYCLIC_FRAGMENT',
      `Cannot spread fragment "${cycle[0]}" within itself${
        via.length > 0 ? ` via ${via.join(', ')}` : ''
      }.`,
      options,
    );
    this.cycle = cycle;
  }
}

export class DuplicateFragmentError extends CompilerError {
  readonly fragmentName: string;

  constructor(fragmentName: string, options?: CompilerErrorOptions) {
    super(
      'DUPLICATE_FRAGMENT',
      `There can be only one fragment named "${fragmentName}".`,
      options,
    );
    this.fragmentName = fragmentName;
  }
}

export class OperationNotFoundError extends CompilerError {
  readonly operationName: string | undefined;

  constructor(message: string, operationName?: string) {
    super('OPERATION_NOT_FOUND', message);
    this.operationName = operationName;
  }
}

export class InvalidSubscriptionSelectionError extends CompilerError {
  constructor(message: string, options?: CompilerErrorOptions) {
    super('INVALID_SUBSCRIPTION_SELECTION', message, options);
  }
}

export class UnknownTypeError extends CompilerError {
  readonly typeName: string;

  constructor(
    typeName: string,
    message: string,
    options?: CompilerErrorOptions,
  ) {
    super('UNKNOWN_TYPE', message, options);
    this.typeName = typeName;
  }
}

export class UnknownFieldError extends CompilerError {
  readonly parentType: string;
  readonly fieldName: string;

  constructor(
    parentType: string,
    fieldName: string,
    options?: CompilerErrorOptions,
  ) {
    super(
      'UNKNOWN_FIELD',
      `Cannot query field "${fieldName}" on type "${parentType}".`,
      options,
    );
    this.parentType = parentType;
    this.fieldName = fieldName;
  }
}

export class NullabilityModifierError extends CompilerError {
  constructor(message: string, options?: CompilerErrorOptions) {
    super('INVALID_NULLABILITY_MODIFIER', message, options);
  }
}
