import type { GraphQLField, GraphQLSchema, GraphQLType } from 'graphql';
import {
  getNamedType,
  getNullableType,
  isInterfaceType,
  isListType,
  isNonNullType,
  isObjectType,
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
} from 'graphql';
import { invariant } from 'graphql/jsutils/invariant.js';

import type { TypeNode } from '../language/ast.js';
import { Kind, OperationTypeNode } from '../language/kinds.js';

import type { FieldMetadata, FieldMetadataProvider } from './FieldMetadata.js';

/**
 * Reads field metadata from an executable schema.
 *
 * Fields of the mutation root, and fields whose extensions set
 * `serial: true`, run serially. Fields returning lists are streamable.
 * `deferrable: false` in the field extensions disables `@defer` below the
 * field. A field that runs in parallel and has no resolver function is
 * pure.
 */
export function createSchemaFieldMetadataProvider(
  schema: GraphQLSchema,
): FieldMetadataProvider {
  const mutationType = schema.getMutationType();
  const queryType = schema.getQueryType();
  const cache = new Map<string, FieldMetadata | undefined>();

  return {
    resolveField(parentTypeName, fieldName) {
      const key = `${parentTypeName}.${fieldName}`;
      if (cache.has(key)) {
        return cache.get(key);
      }

      const parentType = schema.getType(parentTypeName);
      let field: GraphQLField<unknown, unknown> | undefined;
      if (parentType === queryType && fieldName === SchemaMetaFieldDef.name) {
        field = SchemaMetaFieldDef;
      } else if (
        parentType === queryType &&
        fieldName === TypeMetaFieldDef.name
      ) {
        field = TypeMetaFieldDef;
      } else if (isObjectType(parentType) || isInterfaceType(parentType)) {
        field = parentType.getFields()[fieldName];
      }

      let metadata: FieldMetadata | undefined;
      if (field !== undefined) {
        const requiresSerialExecution =
          (mutationType != null && parentType === mutationType) ||
          field.extensions.serial === true;
        metadata = {
          resultType: toTypeNode(field.type),
          requiresSerialExecution,
          isDeferrable: field.extensions.deferrable !== false,
          isStreamable: isListType(getNullableType(field.type)),
          isPure: !requiresSerialExecution && field.resolve === undefined,
        };
      }

      cache.set(key, metadata);
      return metadata;
    },
    getRootType(operationType) {
      switch (operationType) {
        case OperationTypeNode.QUERY:
          return queryType?.name;
        case OperationTypeNode.MUTATION:
          return mutationType?.name;
        case OperationTypeNode.SUBSCRIPTION:
          return schema.getSubscriptionType()?.name;
      }
    },
  };
}

function toTypeNode(type: GraphQLType): TypeNode {
  if (isNonNullType(type)) {
    const ofType = toTypeNode(type.ofType);
    invariant(ofType.kind !== Kind.NON_NULL_TYPE);
    return { kind: Kind.NON_NULL_TYPE, type: ofType };
  }

  if (isListType(type)) {
    return { kind: Kind.LIST_TYPE, type: toTypeNode(type.ofType) };
  }

  return {
    kind: Kind.NAMED_TYPE,
    name: { kind: Kind.NAME, value: getNamedType(type).name },
  };
}
