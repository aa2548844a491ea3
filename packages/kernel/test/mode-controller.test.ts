/**
 * Bastion Kernel — Mode Controller Tests
 *
 * mode/approval: opening an approval moves to ApprovalPending; resolving the
 *   last one returns to Normal
 * mode/sandbox-entry: Sandbox is entered from Normal only
 * mode/sandbox-exit: exit returns the held diffs and lands in Normal
 * mode/suppression: auditSuppressed is true exactly in Sandbox
 * mode/serialization: transitions run one at a time
 */

import { describe, it, expect } from 'vitest';
import { ActionKind, Mode, ModeController, TransitionRejectedError } from '../src/index.js';
import type { Action, ModeTransaction } from '../src/index.js';

const CALL: Action = { kind: ActionKind.InternetCall, actor_id: 'agent_a', purpose: 'search' };
const EDIT: Action = {
  kind: ActionKind.PersonalityWrite,
  actor_id: 'sandbox_1',
  target_id: 'primus_1',
  content: 'warmer',
};

function counter(): () => string {
  let n = 0;
  return () => `apr_${++n}`;
}

describe('mode controller: approvals', () => {
  it('moves to ApprovalPending and back to Normal after the last approval resolves', async () => {
    const modes = new ModeController({ newId: counter() });
    const [first, second] = await modes.transition((tx) => [
      tx.openApproval('agent_a', CALL, 'internet_requires_confirmation'),
      tx.openApproval('agent_b', { ...CALL, actor_id: 'agent_b' }, 'internet_requires_confirmation'),
    ]);
    expect(modes.currentMode()).toBe(Mode.ApprovalPending);
    expect(modes.pendingApprovals().map((p) => p.id)).toEqual(['apr_1', 'apr_2']);

    await modes.transition((tx) => tx.resolveApproval(first.id));
    expect(modes.currentMode()).toBe(Mode.ApprovalPending);
    await modes.transition((tx) => tx.resolveApproval(second.id));
    expect(modes.currentMode()).toBe(Mode.Normal);
  });

  it('reports pending kinds per actor', async () => {
    const modes = new ModeController();
    await modes.transition((tx) => tx.openApproval('agent_a', CALL, 'internet_requires_confirmation'));
    expect([...modes.pendingKinds('agent_a')]).toEqual([ActionKind.InternetCall]);
    expect(modes.pendingKinds('agent_b').size).toBe(0);
  });

  it('cancels only the approvals of the given actor', async () => {
    const modes = new ModeController();
    await modes.transition((tx) => {
      tx.openApproval('agent_a', CALL, 'internet_requires_confirmation');
      tx.openApproval('agent_b', { ...CALL, actor_id: 'agent_b' }, 'internet_requires_confirmation');
    });
    const cancelled = await modes.transition((tx) => tx.cancelApprovalsFor('agent_a'));
    expect(cancelled.map((p) => p.actor_id)).toEqual(['agent_a']);
    expect(modes.pendingApprovals().map((p) => p.actor_id)).toEqual(['agent_b']);
  });

  it('returns undefined for an approval that does not exist', async () => {
    const modes = new ModeController();
    expect(await modes.transition((tx) => tx.resolveApproval('apr_missing'))).toBeUndefined();
  });
});

describe('mode controller: sandbox', () => {
  it('rejects entering Sandbox while approvals are pending', async () => {
    const modes = new ModeController();
    await modes.transition((tx) => tx.openApproval('agent_a', CALL, 'internet_requires_confirmation'));
    await expect(modes.transition((tx) => tx.enterSandbox(false))).rejects.toThrow(
      TransitionRejectedError,
    );
    expect(modes.currentMode()).toBe(Mode.ApprovalPending);
  });

  it('rejects entering Sandbox twice', async () => {
    const modes = new ModeController();
    await modes.transition((tx) => tx.enterSandbox(false));
    await expect(modes.transition((tx) => tx.enterSandbox(false))).rejects.toThrow(
      TransitionRejectedError,
    );
  });

  it('rejects opening an approval inside Sandbox', async () => {
    const modes = new ModeController();
    await modes.transition((tx) => tx.enterSandbox(false));
    await expect(
      modes.transition((tx) => tx.openApproval('agent_a', CALL, 'internet_requires_confirmation')),
    ).rejects.toThrow(TransitionRejectedError);
  });

  it('suppresses audit exactly while in Sandbox', async () => {
    const modes = new ModeController();
    expect(modes.auditSuppressed).toBe(false);
    await modes.transition((tx) => tx.enterSandbox(true));
    expect(modes.auditSuppressed).toBe(true);
    expect(modes.sandboxSession?.edits_confirmed).toBe(true);
    await modes.transition((tx) => tx.exitSandbox());
    expect(modes.auditSuppressed).toBe(false);
  });

  it('returns held diffs on exit in the order they were made', async () => {
    const modes = new ModeController();
    await modes.transition((tx) => tx.enterSandbox(true));
    const second: Action = { ...EDIT, content: 'cooler' };
    await modes.transition((tx) => {
      tx.holdSandboxDiff(EDIT);
      tx.holdSandboxDiff(second);
    });
    const diffs = await modes.transition((tx) => tx.exitSandbox());
    expect(diffs).toEqual([EDIT, second]);
    expect(modes.currentMode()).toBe(Mode.Normal);
  });

  it('rejects exit when not in Sandbox', async () => {
    const modes = new ModeController();
    await expect(modes.transition((tx) => tx.exitSandbox())).rejects.toThrow(
      TransitionRejectedError,
    );
  });

  it('records the history of mode changes', async () => {
    const modes = new ModeController({ clock: () => 't' });
    await modes.transition((tx) => tx.enterSandbox(false));
    await modes.transition((tx) => tx.exitSandbox());
    expect(modes.transitions()).toEqual([
      { from: Mode.Normal, to: Mode.Sandbox, at: 't', cause: 'sandbox_entered' },
      { from: Mode.Sandbox, to: Mode.Normal, at: 't', cause: 'sandbox_exited' },
    ]);
  });
});

describe('mode controller: serialization', () => {
  it('runs transitions one at a time in arrival order', async () => {
    const modes = new ModeController();
    const order: string[] = [];
    const slow = modes.transition(async () => {
      order.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push('slow:end');
    });
    const fast = modes.transition(() => {
      order.push('fast');
    });
    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('refuses a transaction used after its transition finished', async () => {
    const modes = new ModeController();
    const leaked: { tx?: ModeTransaction } = {};
    await modes.transition((tx) => {
      leaked.tx = tx;
    });
    expect(() => leaked.tx?.enterSandbox(false)).toThrow('Mode transaction used after it closed');
    expect(modes.currentMode()).toBe(Mode.Normal);
  });
});
