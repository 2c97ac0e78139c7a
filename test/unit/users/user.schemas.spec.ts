import { describe, it, expect } from 'vitest';
import { decodeUserBody, toUserResponse } from '../../../src/modules/users/user.schemas';

describe('decodeUserBody', () => {
  it('maps wire keys to the domain user', () => {
    const result = decodeUserBody('{"email":"alice@example.com","firstname":"Alice","lastname":"Smith"}');

    expect(result).toEqual({
      ok: true,
      user: { email: 'alice@example.com', firstName: 'Alice', lastName: 'Smith' },
    });
  });

  it('fills missing fields with empty strings and drops unknown keys', () => {
    const result = decodeUserBody('{"email":"bob@example.com","age":41}');

    expect(result).toEqual({
      ok: true,
      user: { email: 'bob@example.com', firstName: '', lastName: '' },
    });
  });

  it('matches keys case-insensitively when no exact wire key is given', () => {
    const result = decodeUserBody('{"Email":"ann@example.com","firstName":"Ann","LASTNAME":"Lee"}');

    expect(result).toEqual({
      ok: true,
      user: { email: 'ann@example.com', firstName: 'Ann', lastName: 'Lee' },
    });
  });

  it('lets the later of two keys for the same field win', () => {
    expect(decodeUserBody('{"email":"a@example.com","firstname":"First","firstName":"Second"}')).toEqual({
      ok: true,
      user: { email: 'a@example.com', firstName: 'Second', lastName: '' },
    });
    expect(decodeUserBody('{"email":"a@example.com","firstName":"First","firstname":"Second"}')).toEqual({
      ok: true,
      user: { email: 'a@example.com', firstName: 'Second', lastName: '' },
    });
  });

  it('treats null fields as empty strings', () => {
    expect(decodeUserBody('{"email":"ann@example.com","firstname":null,"lastname":"Lee"}')).toEqual({
      ok: true,
      user: { email: 'ann@example.com', firstName: '', lastName: 'Lee' },
    });
  });

  it('decodes a JSON null body to the empty user', () => {
    expect(decodeUserBody('null')).toEqual({
      ok: true,
      user: { email: '', firstName: '', lastName: '' },
    });
  });

  it('fails on an empty or missing body', () => {
    expect(decodeUserBody(null)).toEqual({ ok: false, reason: 'empty body' });
    expect(decodeUserBody('   ')).toEqual({ ok: false, reason: 'empty body' });
  });

  it('fails on malformed JSON', () => {
    expect(decodeUserBody('{"email":').ok).toBe(false);
  });

  it('fails when the JSON is not an object', () => {
    expect(decodeUserBody('"alice@example.com"').ok).toBe(false);
    expect(decodeUserBody('[1,2]').ok).toBe(false);
  });

  it('fails when a field has the wrong type', () => {
    expect(decodeUserBody('{"email":42}').ok).toBe(false);
    expect(decodeUserBody('{"email":"a@b.c","firstname":true}').ok).toBe(false);
  });
});

describe('toUserResponse', () => {
  it('uses the lowercase wire keys', () => {
    expect(toUserResponse({ email: 'c@example.com', firstName: 'C', lastName: 'D' })).toEqual({
      email: 'c@example.com',
      firstname: 'C',
      lastname: 'D',
    });
  });
});
