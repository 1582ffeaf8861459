import type { TypeNode } from '../language/ast.js';
import { Kind } from '../language/kinds.js';
import type { OperationTypeNode } from '../language/kinds.js';

/**
 * What the planner needs to know about a field of the schema.
 */
export interface FieldMetadata {
  /** The declared output type of the field. */
  readonly resultType: TypeNode;
  /** Sibling fields run in order around this one, as mutation root fields do. */
  readonly requiresSerialExecution: boolean;
  /** Whether fragments selected on this field's result may be deferred. */
  readonly isDeferrable: boolean;
  /** Whether the list this field returns may be streamed. */
  readonly isStreamable: boolean;
  /**
   * The field resolves without side effects from its parent value alone, so
   * it never waits on its siblings even where serial execution is asked for.
   */
  readonly isPure: boolean;
}

export interface FieldMetadataProvider {
  resolveField(parentType: string, fieldName: string): FieldMetadata | undefined;
  getRootType(operationType: OperationTypeNode): string | undefined;
}

export const TYPENAME_FIELD_METADATA: FieldMetadata = {
  resultType: {
    kind: Kind.NON_NULL_TYPE,
    type: {
      kind: Kind.NAMED_TYPE,
      name: { kind: Kind.NAME, value: 'String' },
    },
  },
  requiresSerialExecution: false,
  isDeferrable: true,
  isStreamable: false,
  isPure: true,
};
