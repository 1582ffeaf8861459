import type { Source } from 'graphql';

import type { DocumentNode } from './language/ast.js';
import type { ParseOptions } from './language/parser.js';
import { parse } from './language/parser.js';
import type { Logger } from './logger.js';
import { defaultLogger } from './logger.js';
import type { PreparedOperation } from './operation/PreparedOperation.js';
import { resolveOperation } from './operation/resolveOperation.js';
import type { FieldMetadataProvider } from './plan/FieldMetadata.js';
import { buildQueryPlan } from './plan/QueryPlanBuilder.js';
import type { QueryPlan } from './plan/QueryPlanNode.js';

export interface CompileArgs {
  source: string | Source;
  operationName?: string | undefined;
  metadata: FieldMetadataProvider;
  parseOptions?: ParseOptions | undefined;
  logger?: Logger | undefined;
}

export interface CompileResult {
  document: DocumentNode;
  operation: PreparedOperation;
  plan: QueryPlan;
}

/**
 * Parses a document, selects and prepares one of its operations, and plans
 * it.
 */
export function compile(args: CompileArgs): CompileResult {
  const { source, operationName, metadata, parseOptions } = args;
  const logger = args.logger ?? defaultLogger;

  const document = parse(source, parseOptions);
  const operation = resolveOperation(document, operationName);

  logger.debug(
    {
      operationName: operation.name,
      fragments: [...operation.fragments.keys()],
    },
    'operation prepared',
  );

  const plan = buildQueryPlan(operation, metadata, { logger });

  return { document, operation, plan };
}
