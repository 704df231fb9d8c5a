import test from 'node:test';
import assert from 'node:assert/strict';

import { parseLooseNumber } from '../server/lib/numberParsing.js';

test('parseLooseNumber strips thousands separators and currency marks', () => {
  assert.equal(parseLooseNumber('1,234.50'), 1234.5);
  assert.equal(parseLooseNumber('₹3,852.40'), 3852.4);
  assert.equal(parseLooseNumber('$ 12'), 12);
  assert.equal(parseLooseNumber('12.5%'), 12.5);
});

test('parseLooseNumber keeps sign and exponent', () => {
  assert.equal(parseLooseNumber('-4.25'), -4.25);
  assert.equal(parseLooseNumber('1.2e3'), 1200);
  assert.equal(parseLooseNumber(' 42 '), 42);
});

test('parseLooseNumber returns null for placeholders and empty input', () => {
  assert.equal(parseLooseNumber('-'), null);
  assert.equal(parseLooseNumber('N/A'), null);
  assert.equal(parseLooseNumber('12.5T'), null);
  assert.equal(parseLooseNumber(''), null);
  assert.equal(parseLooseNumber(null), null);
  assert.equal(parseLooseNumber(undefined), null);
});
