import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ReplySlot } from '../hub/reply-slot';
import {
  HubProperty,
  HubPropertiesMessage,
  HubPropertyRequest,
  PropertyOperation,
} from '../messages';
import { PendingRequestError, ReplyTimeoutError } from '../errors';

function nameRequest(): HubPropertyRequest {
  return new HubPropertyRequest(HubProperty.ADVERTISE_NAME, PropertyOperation.UPD_REQUEST);
}

function nameReply(name = 'Hub'): HubPropertiesMessage {
  return new HubPropertiesMessage(HubProperty.ADVERTISE_NAME, PropertyOperation.UPSTREAM_UPDATE, Buffer.from(name));
}

describe('ReplySlot', () => {
  it('resolves with a matching reply and empties the slot', async () => {
    const slot = new ReplySlot();
    const pending = slot.open(nameRequest());
    assert.equal(slot.busy, true);

    const reply = nameReply();
    assert.equal(slot.offer(reply), true);
    assert.equal(slot.busy, false);
    assert.equal(slot.request, undefined);
    assert.equal(await pending, reply);
  });

  it('ignores messages that do not answer the pending request', async () => {
    const slot = new ReplySlot();
    const request = nameRequest();
    const pending = slot.open(request);
    const button = new HubPropertiesMessage(HubProperty.BUTTON, PropertyOperation.UPSTREAM_UPDATE, Buffer.from([1]));

    assert.equal(slot.offer(button), false);
    assert.equal(slot.request, request);

    const reply = nameReply();
    slot.offer(reply);
    assert.equal(await pending, reply);
  });

  it('offer without a pending request does nothing', () => {
    assert.equal(new ReplySlot().offer(nameReply()), false);
  });

  it('throws synchronously when a second request is opened', async () => {
    const slot = new ReplySlot();
    const first = slot.open(nameRequest());
    assert.throws(() => slot.open(nameRequest()), PendingRequestError);

    slot.offer(nameReply());
    await first;
  });

  it('fail rejects the pending request', async () => {
    const slot = new ReplySlot();
    const pending = slot.open(nameRequest());
    assert.equal(slot.fail(new Error('link lost')), true);
    await assert.rejects(pending, { message: 'link lost' });
    assert.equal(slot.busy, false);
  });

  it('fail for a request that is no longer pending leaves the slot alone', async () => {
    const slot = new ReplySlot();
    const stale = nameRequest();
    const current = nameRequest();
    const pending = slot.open(current);

    assert.equal(slot.fail(new Error('late'), stale), false);
    assert.equal(slot.request, current);

    slot.offer(nameReply());
    await pending;
  });

  it('fulfil completes the request regardless of correlation', async () => {
    const slot = new ReplySlot();
    const pending = slot.open(nameRequest());
    const unrelated = new HubPropertiesMessage(HubProperty.BUTTON, PropertyOperation.UPSTREAM_UPDATE);
    assert.equal(slot.fulfil(unrelated), true);
    assert.equal(await pending, unrelated);
  });

  it('times out and frees the slot', async () => {
    const slot = new ReplySlot();
    const pending = slot.open(nameRequest(), 10);
    await assert.rejects(pending, (err: unknown) => {
      assert.ok(err instanceof ReplyTimeoutError);
      assert.equal(err.timeoutMs, 10);
      assert.equal(err.message, 'No reply to HubPropertyRequest(01 05) within 10ms');
      return true;
    });
    assert.equal(slot.busy, false);
  });

  it('a reply before the timeout cancels the timer', async () => {
    const slot = new ReplySlot();
    const pending = slot.open(nameRequest(), 50);
    const reply = nameReply();
    slot.offer(reply);
    assert.equal(await pending, reply);
  });
});
