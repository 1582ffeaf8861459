import { expect } from 'chai';
import { parse as parseGraphQL, print as printGraphQL } from 'graphql';
import { describe, it } from 'mocha';

import { dedent } from '../../__testUtils__/dedent.js';

import { astEquals } from '../astEquals.js';
import { parse, parseValue } from '../parser.js';
import { Kind } from '../kinds.js';
import { print } from '../printer.js';

function printStringValue(value: string): string {
  return print({ kind: Kind.STRING, value, block: false });
}

describe('Printer', () => {
  it('uses the query shorthand only when nothing else is declared', () => {
    expect(print(parse('{ a }'))).to.equal('{\n  a\n}');
    expect(print(parse('query { a }'))).to.equal('{\n  a\n}');
    expect(print(parse('query Q { a }'))).to.equal('query Q {\n  a\n}');
    expect(print(parse('query @dir { a }'))).to.equal('query @dir {\n  a\n}');
    expect(print(parse('mutation { a }'))).to.equal('mutation {\n  a\n}');
  });

  it('prints a document with fragments', () => {
    const document = dedent`
      query Q($id: ID!) {
        hero(id: $id) {
          ...Parts
          ... on Droid @include(if: true) {
            primaryFunction
          }
          ... @skip(if: false) {
            name
          }
        }
      }

      fragment Parts on Character @dir {
        id
        friends(first: 2) {
          name
        }
      }
    `;

    expect(print(parse(document))).to.equal(document);
  });

  it('prints nullability modifiers', () => {
    expect(print(parse('{ a! b[?] c(x: 1)[[!]]? }'))).to.equal(
      '{\n  a!\n  b[?]\n  c(x: 1)[[!]]?\n}',
    );
  });

  it('prints variable definitions with constant defaults', () => {
    expect(
      print(parse('query ($o: In = {a: 1, b: [2]} @dir) { f }')),
    ).to.equal('query ($o: In = {a: 1, b: [2]} @dir) {\n  f\n}');
  });

  it('wraps long argument lists', () => {
    const printed = print(
      parse(
        '{ field(argumentNumberOne: "aaaaaaaaaaaaaaaaaaaa", argumentNumberTwo: "bbbbbbbbbbbbbbbbbbbb") }',
      ),
    );

    expect(printed).to.equal(dedent`
      {
        field(
          argumentNumberOne: "aaaaaaaaaaaaaaaaaaaa"
          argumentNumberTwo: "bbbbbbbbbbbbbbbbbbbb"
        )
      }
    `);
  });

  it('prints block strings', () => {
    expect(print(parseValue('"""\n  hello\n    world\n"""'))).to.equal(
      '"""\nhello\n  world\n"""',
    );
    expect(print(parseValue('"""single"""'))).to.equal('"""single"""');
  });

  it('escapes strings', () => {
    expect(
      printStringValue(
        'quote " backslash \\ newline \n tab \t bell \u0007 del \u007F',
      ),
    ).to.equal(
      '"quote \\" backslash \\\\ newline \\n tab \\t bell \\u0007 del \\u007F"',
    );
    expect(printStringValue('emoji \u{1F600}')).to.equal('"emoji \u{1F600}"');
  });

  it('prints what it parses', () => {
    const source = dedent`
      query Q($a: Int = 1, $b: [String!]! @dir) {
        alias: f(a: $a, b: "x") @skip(if: false) {
          ...F
          g[!]
        }
      }

      fragment F on T {
        h
      }
    `;
    const document = parse(source);

    expect(astEquals(parse(print(document)), document)).to.equal(true);
  });

  it('matches graphql-js output on standard syntax', () => {
    const sources = [
      '{ a b { c } }',
      'query Q($a: Int = 1, $b: [String!]!) @dir { alias: f(a: $a, b: "x\\"y") @skip(if: false) { ...F } }\nfragment F on T @dir { g ... on U { h } ... { i } }',
      'mutation M { save(input: [1, 2.5, ENUM, null, true]) }',
      '{ field(argumentNumberOne: "aaaaaaaaaaaaaaaaaaaa", argumentNumberTwo: "bbbbbbbbbbbbbbbbbbbb") }',
    ];

    for (const source of sources) {
      expect(print(parse(source))).to.equal(printGraphQL(parseGraphQL(source)));
    }
  });
});
