import { describe, it, expect } from 'vitest';
import { parseBoolean, parseChoice, parseInteger, readField, readString, requireString } from '../validation/params';
import { InvalidArgumentError } from '../../types/errors';

describe('request parameter parsing', () => {
  it('takes the last value of a repeated parameter', () => {
    expect(readString(['first@mergington.edu', 'last@mergington.edu'])).toBe('last@mergington.edu');
    expect(readString({ nested: 'x' })).toBeUndefined();
  });

  it('requires a string value', () => {
    expect(requireString('ada@mergington.edu', 'email', 'query')).toBe('ada@mergington.edu');
    expect(() => requireString(undefined, 'email', 'query')).toThrow('Invalid email: Field required');
  });

  it('parses the accepted boolean spellings', () => {
    expect(parseBoolean('true', 'descending', 'query', false)).toBe(true);
    expect(parseBoolean('YES', 'descending', 'query', false)).toBe(true);
    expect(parseBoolean('0', 'descending', 'query', true)).toBe(false);
    expect(parseBoolean(undefined, 'descending', 'query', false)).toBe(false);
  });

  it('rejects other boolean values with field details', () => {
    let caught: unknown;
    try {
      parseBoolean('maybe', 'descending', 'query', false);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidArgumentError);
    expect(caught).toMatchObject({
      statusCode: 422,
      details: [{ field: 'descending', location: 'query', message: 'Input should be a valid boolean' }]
    });
  });

  it('parses integers, signs included', () => {
    expect(parseInteger('42', 'score', 'form')).toBe(42);
    expect(parseInteger(' -7 ', 'score', 'form')).toBe(-7);
    expect(() => parseInteger('4.5', 'score', 'form')).toThrow('Invalid score: Input should be a valid integer');
    expect(() => parseInteger('', 'score', 'form')).toThrow(InvalidArgumentError);
  });

  it('restricts choices and applies the default', () => {
    const choices = ['name', 'score'] as const;
    expect(parseChoice(undefined, 'sort_by', 'query', choices, 'name')).toBe('name');
    expect(parseChoice('score', 'sort_by', 'query', choices, 'name')).toBe('score');
    expect(() => parseChoice('Score', 'sort_by', 'query', choices, 'name'))
      .toThrow("Invalid sort_by: Input should be 'name', 'score'");
  });

  it('reads fields from untyped bodies', () => {
    expect(readField({ email: 'ada@mergington.edu' }, 'email')).toBe('ada@mergington.edu');
    expect(readField(undefined, 'email')).toBeUndefined();
    expect(readField('text', 'email')).toBeUndefined();
  });
});
