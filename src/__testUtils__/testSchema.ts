import { buildSchema } from 'graphql';

import { createSchemaFieldMetadataProvider } from '../plan/schemaFieldMetadata.js';

export const testSchema = buildSchema(`
  interface Node {
    id: ID!
  }

  type Character implements Node {
    id: ID!
    name: String
    friends: [Character]
  }

  type Query {
    hero: Character
    heroes: [Character!]!
    numbers: [Int]
    matrix: [[Int]]
    version: String
    node(id: ID!): Node
  }

  type Mutation {
    first: String
    second: String
  }

  type Subscription {
    heroChanged: Character
    count: Int
    counts: [Int]
  }
`);

export const testMetadata = createSchemaFieldMetadataProvider(testSchema);
