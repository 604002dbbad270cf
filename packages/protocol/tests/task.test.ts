import { describe, it, expect } from 'vitest';
import {
  parseCreateTaskRequest,
  parseUpdateTaskRequest,
  parseTaskListQuery,
  TASK_TITLE_MAX_LENGTH,
  TASK_DESCRIPTION_MAX_LENGTH,
} from '../src/index';

describe('parseCreateTaskRequest', () => {
  it('trims title and description', () => {
    const result = parseCreateTaskRequest({ title: '  Buy milk ', description: ' two litres ' });

    expect(result).toEqual({
      success: true,
      data: { title: 'Buy milk', description: 'two litres' },
    });
  });

  it('accepts a payload without description', () => {
    const result = parseCreateTaskRequest({ title: 'Only a title' });

    expect(result).toEqual({ success: true, data: { title: 'Only a title' } });
  });

  it('stores a blank description as null', () => {
    const result = parseCreateTaskRequest({ title: 'Title', description: '   ' });

    expect(result).toEqual({ success: true, data: { title: 'Title', description: null } });
  });

  it('rejects an empty title', () => {
    expect(parseCreateTaskRequest({ title: '' })).toEqual({
      success: false,
      message: 'title: must not be empty',
    });
  });

  it('rejects a whitespace-only title', () => {
    expect(parseCreateTaskRequest({ title: ' \t\n ' })).toEqual({
      success: false,
      message: 'title: must not be empty',
    });
  });

  it('rejects a missing title', () => {
    expect(parseCreateTaskRequest({ description: 'no title' })).toEqual({
      success: false,
      message: 'title: is required',
    });
  });

  it('rejects a non-string title', () => {
    expect(parseCreateTaskRequest({ title: 42 })).toEqual({
      success: false,
      message: 'title: must be a string',
    });
  });

  it('rejects titles over the length limit', () => {
    const result = parseCreateTaskRequest({ title: 'x'.repeat(TASK_TITLE_MAX_LENGTH + 1) });

    expect(result).toEqual({
      success: false,
      message: `title: must be at most ${TASK_TITLE_MAX_LENGTH} characters`,
    });
  });

  it('rejects descriptions over the length limit', () => {
    const result = parseCreateTaskRequest({
      title: 'ok',
      description: 'x'.repeat(TASK_DESCRIPTION_MAX_LENGTH + 1),
    });

    expect(result).toEqual({
      success: false,
      message: `description: must be at most ${TASK_DESCRIPTION_MAX_LENGTH} characters`,
    });
  });

  it('rejects unknown fields such as ownerId', () => {
    expect(parseCreateTaskRequest({ title: 'mine', ownerId: 'someone-else' })).toEqual({
      success: false,
      message: 'unknown field: ownerId',
    });
  });

  it('rejects a payload that is not an object', () => {
    const result = parseCreateTaskRequest('Buy milk');

    expect(result.success).toBe(false);
  });
});

describe('parseUpdateTaskRequest', () => {
  it('accepts an empty patch', () => {
    expect(parseUpdateTaskRequest({})).toEqual({ success: true, data: {} });
  });

  it('keeps only the supplied fields', () => {
    expect(parseUpdateTaskRequest({ completed: true })).toEqual({
      success: true,
      data: { completed: true },
    });
  });

  it('clears the description with null', () => {
    expect(parseUpdateTaskRequest({ description: null })).toEqual({
      success: true,
      data: { description: null },
    });
  });

  it('rejects clearing the title', () => {
    expect(parseUpdateTaskRequest({ title: '   ' })).toEqual({
      success: false,
      message: 'title: must not be empty',
    });
  });

  it('rejects a non-boolean completed', () => {
    expect(parseUpdateTaskRequest({ completed: 'yes' })).toEqual({
      success: false,
      message: 'completed: must be a boolean',
    });
  });

  it('rejects attempts to change the owner', () => {
    expect(parseUpdateTaskRequest({ title: 'moved', ownerId: 'u-2' })).toEqual({
      success: false,
      message: 'unknown field: ownerId',
    });
  });
});

describe('parseTaskListQuery', () => {
  it('returns no filter when the query is empty', () => {
    expect(parseTaskListQuery({})).toEqual({ success: true, data: {} });
    expect(parseTaskListQuery(undefined)).toEqual({ success: true, data: {} });
  });

  it('parses completed=true and completed=false', () => {
    expect(parseTaskListQuery({ completed: 'true' })).toEqual({ success: true, data: { completed: true } });
    expect(parseTaskListQuery({ completed: 'false' })).toEqual({ success: true, data: { completed: false } });
  });

  it('maps the status alias onto completed', () => {
    expect(parseTaskListQuery({ status: 'pending' })).toEqual({ success: true, data: { completed: false } });
    expect(parseTaskListQuery({ status: 'completed' })).toEqual({ success: true, data: { completed: true } });
  });

  it('accepts agreeing completed and status values', () => {
    expect(parseTaskListQuery({ completed: 'true', status: 'completed' })).toEqual({
      success: true,
      data: { completed: true },
    });
  });

  it('rejects conflicting completed and status values', () => {
    expect(parseTaskListQuery({ completed: 'true', status: 'pending' })).toEqual({
      success: false,
      message: 'status: conflicts with completed',
    });
  });

  it('rejects malformed values', () => {
    expect(parseTaskListQuery({ completed: 'yes' })).toEqual({
      success: false,
      message: 'completed: must be "true" or "false"',
    });
    expect(parseTaskListQuery({ status: 'done' })).toEqual({
      success: false,
      message: 'status: must be "pending" or "completed"',
    });
  });

  it('ignores unrelated query parameters', () => {
    expect(parseTaskListQuery({ page: '2' })).toEqual({ success: true, data: {} });
  });
});
