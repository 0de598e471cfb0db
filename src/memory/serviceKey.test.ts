import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { deriveServiceKey, describeDatabase } from './serviceKey.js';

describe('deriveServiceKey', () => {
  it('uses the namespace alone when no user is given', () => {
    assert.equal(deriveServiceKey('acct1'), 'acct1');
    assert.equal(deriveServiceKey('acct1', null), 'acct1');
    assert.equal(deriveServiceKey('acct1', ''), 'acct1');
  });

  it('appends the user id after the _user_ separator', () => {
    assert.equal(deriveServiceKey('acct1', 'u9'), 'acct1_user_u9');
    assert.equal(deriveServiceKey('default', 'customer_123'), 'default_user_customer_123');
  });
});

describe('describeDatabase', () => {
  it('extracts host and port from a connection string with credentials', () => {
    assert.equal(describeDatabase('postgres://user:pw@host:5432/dbname'), 'host:5432');
  });

  it('returns unknown when the connection string has no credentials section', () => {
    assert.equal(describeDatabase('sqlite:///local.db'), 'unknown');
  });

  it('takes the segment after the first @', () => {
    assert.equal(describeDatabase('postgres://user:pw@db.internal'), 'db.internal');
  });
});
