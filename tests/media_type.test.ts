import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { isConsumed, negotiateProduced, parseAccept, parseMediaType } from '../src/codec/media-type.js';
import { createDefaultRegistry } from '../src/codec/registry.js';

describe('media types', () => {
  it('parses type, subtype and quoted parameters', () => {
    assert.deepEqual(parseMediaType('Application/JSON; charset="utf-8"'), {
      type: 'application',
      subtype: 'json',
      essence: 'application/json',
      params: { charset: 'utf-8' }
    });
    assert.equal(parseMediaType('garbage'), undefined);
    assert.equal(parseMediaType(''), undefined);
  });

  it('orders Accept ranges by quality then specificity', () => {
    const order = parseAccept('text/*;q=0.5, */*;q=0.1, application/json').map(r => r.essence);
    assert.deepEqual(order, ['application/json', 'text/*', '*/*']);
    assert.deepEqual(parseAccept('text/*, text/plain').map(r => r.essence), ['text/plain', 'text/*']);
    assert.deepEqual(parseAccept(undefined).map(r => r.essence), ['*/*']);
  });

  it('negotiates the produced type in the client order', () => {
    const produces = ['application/json', 'text/plain'];
    assert.equal(negotiateProduced('text/plain', produces), 'text/plain');
    assert.equal(negotiateProduced(undefined, produces), 'application/json');
    assert.equal(negotiateProduced('text/*;q=0.9, application/json', produces), 'application/json');
    assert.equal(negotiateProduced('image/png', produces), undefined);
    assert.equal(negotiateProduced('text/plain;q=0', ['text/plain']), undefined);
  });

  it('checks request content types against consumed ranges', () => {
    assert.equal(isConsumed(parseMediaType('application/vnd.item+json'), ['application/json']), true);
    assert.equal(isConsumed(parseMediaType('text/plain;charset=utf-8'), ['text/*']), true);
    assert.equal(isConsumed(parseMediaType('text/plain'), ['application/json']), false);
    assert.equal(isConsumed(undefined, ['text/plain']), false);
    assert.equal(isConsumed(undefined, []), true);
  });
});

describe('CodecRegistry', () => {
  const registry = createDefaultRegistry();

  it('finds codecs by content type', () => {
    assert.equal(registry.forMediaType('application/x-msgpack')?.name, 'msgpack');
    assert.equal(registry.forMediaType('application/problem+json')?.name, 'json');
    assert.equal(registry.forMediaType('application/x-www-form-urlencoded; charset=utf-8')?.name, 'form');
    assert.equal(registry.forMediaType('text/html'), undefined);
  });

  it('finds codecs by sub-protocol token', () => {
    assert.equal(registry.forSubprotocol('json')?.name, 'json');
    assert.equal(registry.forSubprotocol('application/msgpack')?.name, 'msgpack');
    assert.equal(registry.forSubprotocol('nope'), undefined);
  });

  it('chooses a response codec from Accept, else the default', () => {
    assert.deepEqual(
      { name: registry.chooseForResponse('application/msgpack').codec.name, type: registry.chooseForResponse('application/msgpack').contentType },
      { name: 'msgpack', type: 'application/msgpack' }
    );
    assert.equal(registry.chooseForResponse('text/plain').codec.name, 'text');
    assert.equal(registry.chooseForResponse(undefined).contentType, 'application/json');
    assert.equal(createDefaultRegistry('msgpack').chooseForResponse('*/*').contentType, 'application/msgpack');
  });
});
