import { describe, expect, it } from '@jest/globals';
import {
  BlogError,
  BlogErrorType,
  ConfigError,
  FrontMatterError,
  PostNotFoundError,
  describeError,
} from '../../src/lib/errors';

describe('errors', () => {
  it('tags errors with their type', () => {
    const cause = new Error('disk');
    const error = new BlogError('Could not write', BlogErrorType.IO, { path: '/tmp/x' }, { cause });

    expect(error.toString()).toBe('[io_error] Could not write');
    expect(error.details).toEqual({ path: '/tmp/x' });
    expect(error.cause).toBe(cause);
  });

  it('summarises configuration problems', () => {
    const error = new ConfigError(['A bad', 'B worse']);

    expect(error).toBeInstanceOf(BlogError);
    expect(error.message).toBe('Invalid configuration: A bad; B worse');
    expect(error.type).toBe(BlogErrorType.CONFIGURATION);
  });

  it('lists front matter issues after the file', () => {
    const error = new FrontMatterError('a.md', [
      { field: 'title', message: 'title is required' },
      { field: 'date', message: 'date must be a valid date' },
    ]);

    expect(error.message).toBe('a.md: title: title is required; date: date must be a valid date');
    expect(error.name).toBe('FrontMatterError');
  });

  it('names the missing slug', () => {
    expect(new PostNotFoundError('nope').message).toBe('No post with slug "nope"');
  });

  it('describes anything thrown', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('text');
    expect(describeError({ code: 1 })).toBe('{"code":1}');
    expect(describeError(undefined)).toBe('undefined');
  });
});
