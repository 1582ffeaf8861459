import { expect } from 'chai';
import { describe, it } from 'mocha';

import { astEquals } from '../astEquals.js';
import { Kind } from '../kinds.js';
import { parse, parseValue } from '../parser.js';

describe('astEquals', () => {
  it('ignores locations', () => {
    expect(astEquals(parse('{ a }'), parse('{a}'))).to.equal(true);
  });

  it('compares parsed nodes with hand-built ones', () => {
    expect(
      astEquals(parseValue('[1, "x"]'), {
        kind: Kind.LIST,
        values: [
          { kind: Kind.INT, value: '1' },
          { kind: Kind.STRING, value: 'x', block: false },
        ],
      }),
    ).to.equal(true);
  });

  it('treats undefined properties as absent', () => {
    expect(
      astEquals({ kind: Kind.NAME, value: 'a', alias: undefined }, {
        kind: Kind.NAME,
        value: 'a',
      }),
    ).to.equal(true);
  });

  it('detects differences', () => {
    expect(astEquals(parse('{ a }'), parse('{ b }'))).to.equal(false);
    expect(astEquals(parse('{ a b }'), parse('{ a }'))).to.equal(false);
    expect(astEquals(parse('{ a! }'), parse('{ a }'))).to.equal(false);
    expect(astEquals([], {})).to.equal(false);
    expect(astEquals({}, [])).to.equal(false);
  });
});
