import test from 'node:test';
import assert from 'node:assert/strict';
import { resolvePrompt } from '../src/llm/prompts';
import { ConversationContext } from '../src/core/context';

test('prompt table covers each analysis type', () => {
  assert.equal(resolvePrompt('summary', 'abc'), 'Provide a concise summary of the following text:\nabc');
  assert.equal(resolvePrompt('keywords', 'abc'), 'Extract key themes and keywords from the following text:\nabc');
  assert.equal(resolvePrompt('general', 'abc'), 'Analyze the following content:\nabc');
});

test('inherited object keys do not count as analysis types', () => {
  assert.equal(resolvePrompt('toString', 'abc'), 'Analyze the following content:\nabc');
});

test('context renders one labelled line per turn', () => {
  const ctx = new ConversationContext();
  assert.equal(ctx.render(), '');
  ctx.append('user', 'hi');
  ctx.append('assistant', 'hello');
  assert.equal(ctx.render(), 'User: hi\nAssistant: hello\n');
  assert.equal(ctx.length, 2);
  ctx.clear();
  assert.equal(ctx.length, 0);
});
