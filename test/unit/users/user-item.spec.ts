import { describe, it, expect } from 'vitest';
import { marshalUser, unmarshalUser } from '../../../src/modules/users/dal/user-item';
import { UserStoreError } from '../../../src/modules/users/dal/user-store';

describe('user item mapping', () => {
  it('marshals to the stored attribute names', () => {
    expect(marshalUser({ email: 'a@example.com', firstName: 'Ann', lastName: 'Lee' })).toEqual({
      email: 'a@example.com',
      firstname: 'Ann',
      lastname: 'Lee',
    });
  });

  it('unmarshals stored attributes and defaults missing names to empty strings', () => {
    expect(unmarshalUser({ email: 'a@example.com', firstname: 'Ann' })).toEqual({
      email: 'a@example.com',
      firstName: 'Ann',
      lastName: '',
    });
  });

  it('throws a decode error for items without a string email', () => {
    let caught: unknown;
    try {
      unmarshalUser({ firstname: 'Ann', lastname: 'Lee' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UserStoreError);
    expect((caught as UserStoreError).kind).toBe('decode');
  });

  it('throws a decode error for non-string attributes', () => {
    expect(() => unmarshalUser({ email: 'a@example.com', firstname: 7 })).toThrowError(
      UserStoreError,
    );
    expect(() => unmarshalUser(null)).toThrowError(UserStoreError);
  });
});
