import { describe, it, expect } from 'vitest';
import {
  NO_RESPONSE_TEXT,
  ResponseFormatter,
} from '../../../src/cli/formatters/ResponseFormatter.js';

describe('ResponseFormatter', () => {
  const formatter = new ResponseFormatter();

  it('should print the IGV response verbatim as text', () => {
    expect(formatter.formatResponse('goto chr1', 'OK', 'text')).toBe('OK');
    expect(formatter.formatResponse('goto chr1', 'Cannot find feature or locus: xyz', 'text')).toBe(
      'Cannot find feature or locus: xyz',
    );
  });

  it('should explain a missing response', () => {
    expect(formatter.formatResponse('exit', null, 'text')).toBe(NO_RESPONSE_TEXT);
  });

  it('should mark skipped commands', () => {
    expect(formatter.formatResponse('snapshotDirectory', undefined, 'text')).toBe(
      'snapshotDirectory: skipped (unchanged)',
    );
  });

  it('should emit command and response as JSON', () => {
    expect(JSON.parse(formatter.formatResponse('echo', 'echo', 'json'))).toEqual({
      command: 'echo',
      response: 'echo',
    });
    expect(JSON.parse(formatter.formatResponse('exit', undefined, 'json'))).toEqual({
      command: 'exit',
      response: null,
    });
  });

  it('should flatten objects into indented text', () => {
    const text = formatter.formatObject({ processGroupId: 4242, connection: { port: 60151 } }, 'text');
    expect(text).toBe('processGroupId: 4242\nconnection:\n  port: 60151');
  });
});
