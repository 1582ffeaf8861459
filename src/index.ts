/**
 * Parses GraphQL executable documents and compiles their operations into
 * query plans with serial, parallel, deferred and streamed parts.
 *
 * @packageDocumentation
 */

export { compile } from './compile.js';
export type { CompileArgs, CompileResult } from './compile.js';

export { Token } from './language/ast.js';
export type * from './language/ast.js';
export { Kind, OperationTypeNode } from './language/kinds.js';
export { TokenKind } from './language/tokenKind.js';
export { Lexer, tokenize } from './language/lexer.js';
export { parse, parseType, parseValue } from './language/parser.js';
export type { ParseOptions } from './language/parser.js';
export { print } from './language/printer.js';
export { astEquals } from './language/astEquals.js';

export { resolveOperation } from './operation/resolveOperation.js';
export type { PreparedOperation } from './operation/PreparedOperation.js';

export type {
  FieldMetadata,
  FieldMetadataProvider,
} from './plan/FieldMetadata.js';
export { createSchemaFieldMetadataProvider } from './plan/schemaFieldMetadata.js';
export { buildQueryPlan, createQueryPlan } from './plan/QueryPlanBuilder.js';
export type { BuildQueryPlanOptions } from './plan/QueryPlanBuilder.js';
export { QueryPlanContext } from './plan/QueryPlanContext.js';
export type { DeferredFragment } from './plan/QueryPlanContext.js';
export type * from './plan/QueryPlanNode.js';
export { printQueryPlan } from './plan/printQueryPlan.js';

export {
  CompilerError,
  CyclicFragmentError,
  DepthLimitError,
  DuplicateFragmentError,
  FragmentNotFoundError,
  GraphQLSyntaxError,
  InvalidSubscriptionSelectionError,
  LexicalError,
  NullabilityModifierError,
  OperationNotFoundError,
  UnknownFieldError,
  UnknownTypeError,
} from './error/errors.js';
export type { CompilerErrorOptions } from './error/errors.js';

export { defaultLogger } from './logger.js';
export type { Logger } from './logger.js';
