/**
 * @kqlrun/test-utils - FakeBackend tests
 */

import { describe, it, expect } from 'vitest';
import { FakeBackend, generateRows } from '../index.js';

describe('FakeBackend', () => {
  it('should match configured queries regardless of surrounding whitespace', async () => {
    const backend = new FakeBackend({ responses: { '\nConn | take 1\n': [{ Device: 'web-01' }] } });

    expect(await backend.execute({ query: 'Conn | take 1', workspaceId: 'ws' })).toEqual([{ Device: 'web-01' }]);
    expect(await backend.execute({ query: '  Conn | take 1\n', workspaceId: 'ws' })).toEqual([{ Device: 'web-01' }]);
  });

  it('should add responses with respond()', async () => {
    const backend = new FakeBackend()
      .respond(' Conn ', [{ Device: 'db-01' }])
      .respond('Broken', new Error('Syntax error near Broken'));

    expect(await backend.execute({ query: 'Conn', workspaceId: 'ws' })).toEqual([{ Device: 'db-01' }]);
    await expect(backend.execute({ query: 'Broken\n', workspaceId: 'ws' })).rejects.toThrow('Syntax error near Broken');
    expect(backend.queries()).toEqual(['Conn', 'Broken']);
  });

  it('should return the default response for unknown queries', async () => {
    expect(await new FakeBackend().execute({ query: 'Other', workspaceId: 'ws' })).toEqual([]);
    expect(await new FakeBackend({ defaultResponse: 'text' }).execute({ query: 'Other', workspaceId: 'ws' })).toBe(
      'text'
    );
  });

  it('should apply delays keyed with surrounding whitespace', async () => {
    const backend = new FakeBackend({ delays: { ' Slow ': 5 } });
    const started = Date.now();
    await backend.execute({ query: 'Slow', workspaceId: 'ws' });
    expect(Date.now() - started).toBeGreaterThanOrEqual(4);
  });
});

describe('generateRows', () => {
  it('should number rows from the offset', () => {
    const [first, second] = generateRows(2, 3);
    expect(first).toEqual({
      TimeGenerated: '2024-03-01T03:00:00.000Z',
      DeviceName: 'host-03',
      RemoteIP: '10.0.0.4',
      RemotePort: 3389,
      ActionType: 'ConnectionFailed',
    });
    expect(second?.DeviceName).toBe('host-04');
    expect(second?.ActionType).toBe('ConnectionSuccess');
  });
});
