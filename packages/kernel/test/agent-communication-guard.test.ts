/**
 * Bastion Kernel — Agent Communication Guard Tests
 */

import { describe, it, expect } from 'vitest';
import { AgentCommunicationGuard, MAX_PARTICIPANTS } from '../src/index.js';

function guard(): AgentCommunicationGuard {
  let n = 0;
  return new AgentCommunicationGuard({ newId: () => `col_${++n}`, clock: () => 't' });
}

describe('agent communication guard: collaborations', () => {
  it('holds two agents', () => {
    expect(MAX_PARTICIPANTS).toBe(2);
    const g = guard();
    expect(g.open('a', 'b')).toEqual({ id: 'col_1', members: ['a', 'b'] });
    expect(g.collaborationOf('b')?.id).toBe('col_1');
  });

  it('refuses a third member and changes nothing', () => {
    const g = guard();
    g.open('a', 'b');
    expect(g.join('col_1', 'c')).toBe(false);
    expect(g.collaboration('col_1')?.members).toEqual(['a', 'b']);
    expect(g.collaborationOf('c')).toBeUndefined();
  });

  it('admits a new member after one leaves', () => {
    const g = guard();
    g.open('a', 'b');
    g.leave('b');
    expect(g.join('col_1', 'c')).toBe(true);
    expect(g.collaboration('col_1')?.members).toEqual(['a', 'c']);
  });

  it('removes a collaboration once everyone has left', () => {
    const g = guard();
    g.open('a', 'b');
    g.leave('a');
    g.leave('b');
    expect(g.collaboration('col_1')).toBeUndefined();
  });
});

describe('agent communication guard: shares and pairs', () => {
  it('accumulates shared keys per direction', () => {
    const g = guard();
    g.open('a', 'b');
    g.share('a', 'b', ['x']);
    g.share('a', 'b', ['y']);
    expect([...g.sharedKeys('a', 'b')].sort()).toEqual(['x', 'y']);
    expect(g.sharedKeys('b', 'a').size).toBe(0);
  });

  it('withdraws shares when a member leaves', () => {
    const g = guard();
    g.open('a', 'b');
    g.share('a', 'b', ['x']);
    g.leave('a');
    expect(g.sharedKeys('a', 'b').size).toBe(0);
  });

  it('treats pair authorization as unordered and revocable', () => {
    const g = guard();
    g.authorizePair('b', 'a');
    expect(g.isPairAuthorized('a', 'b')).toBe(true);
    expect(g.revokePair('a', 'b')).toBe(true);
    expect(g.isPairAuthorized('b', 'a')).toBe(false);
  });

  it('drops pair approvals and inbox of a removed agent', () => {
    const g = guard();
    g.authorizePair('a', 'b');
    g.deliver('b', 'a', 'ping');
    g.removeAgent('a');
    expect(g.isPairAuthorized('a', 'b')).toBe(false);
    expect(g.drainInbox('a')).toEqual([]);
  });

  it('drains an inbox once', () => {
    const g = guard();
    g.deliver('a', 'b', 'ping');
    expect(g.drainInbox('b')).toEqual([{ sender_id: 'a', receiver_id: 'b', body: 'ping', sent_at: 't' }]);
    expect(g.drainInbox('b')).toEqual([]);
  });
});
