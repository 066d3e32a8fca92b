import test from 'node:test';
import assert from 'node:assert/strict';
import { GenAIClient, previewContent } from '../src/llm/llm-base';
import { ConfigurationError } from '../src/core/errors';
import { FakeProvider } from './helpers';

function makeClient(provider: FakeProvider) {
  return new GenAIClient({ apiKey: 'test-secret', model: 'test-model', provider }, {});
}

test('missing credential raises ConfigurationError', () => {
  assert.throws(() => new GenAIClient({ provider: new FakeProvider() }, {}), ConfigurationError);
  assert.throws(() => new GenAIClient({ apiKey: '   ' }, {}), ConfigurationError);
});

test('credential falls back to the environment', () => {
  const client = new GenAIClient({ provider: new FakeProvider() }, { GOOGLE_GEMINI_API_KEY: 'test-secret' });
  assert.equal(client.getHistory().length, 0);
});

test('generateText merges sampling params with defaults', async () => {
  const provider = new FakeProvider(['generated']);
  const client = makeClient(provider);
  const out = await client.generateText('describe layers', { temperature: 0.2, topK: 10 });
  assert.equal(out, 'generated');
  assert.deepEqual(provider.requests[0], {
    model: 'test-model',
    prompt: 'describe layers',
    sampling: { temperature: 0.2, maxTokens: 2048, topP: 0.9, topK: 10 }
  });
});

test('explicit undefined sampling params keep their defaults', async () => {
  const provider = new FakeProvider(['ok']);
  const client = makeClient(provider);
  await client.generateText('x', { temperature: undefined, maxTokens: 64 });
  assert.deepEqual(provider.requests[0].sampling, { temperature: 0.7, maxTokens: 64, topP: 0.9, topK: 40 });
});

test('generateText surfaces provider errors unchanged', async () => {
  const provider = new FakeProvider();
  const boom = new Error('quota exceeded');
  provider.failWith = boom;
  const client = makeClient(provider);
  await assert.rejects(client.generateText('x'), (err) => err === boom);
  assert.equal(provider.requests.length, 1);
});

test('reset clears history and one turn records user then assistant', async () => {
  const provider = new FakeProvider(['hello there']);
  const client = makeClient(provider);
  client.resetConversation();
  assert.deepEqual(client.getHistory(), []);

  const reply = await client.sendConversationTurn('hi');
  assert.equal(reply, 'hello there');
  assert.deepEqual(client.getHistory(), [
    { role: 'user', content: 'hi' },
    { role: 'assistant', content: 'hello there' }
  ]);
  assert.equal(provider.requests[0].prompt, 'User: hi\n');
});

test('each turn re-sends the full flattened transcript', async () => {
  const provider = new FakeProvider(['hello', 'fine']);
  const client = makeClient(provider);
  await client.chat('hi');
  await client.chat('how are you');
  assert.equal(provider.requests[1].prompt, 'User: hi\nAssistant: hello\nUser: how are you\n');
  assert.equal(client.getHistory().length, 4);
});

test('a failed turn keeps the user message and propagates the error', async () => {
  const provider = new FakeProvider();
  provider.failWith = new Error('upstream 503');
  const client = makeClient(provider);
  await assert.rejects(client.sendConversationTurn('hi'), /upstream 503/);
  assert.deepEqual(client.getHistory(), [{ role: 'user', content: 'hi' }]);
});

test('getHistory returns a copy', async () => {
  const client = makeClient(new FakeProvider(['ok']));
  await client.chat('hi');
  const history = client.getHistory();
  history.pop();
  history[0].content = 'changed';
  assert.deepEqual(client.getHistory(), [
    { role: 'user', content: 'hi' },
    { role: 'assistant', content: 'ok' }
  ]);
});

test('clearHistory and startConversation empty the transcript', async () => {
  const client = makeClient(new FakeProvider(['a', 'b']));
  await client.chat('one');
  client.clearHistory();
  assert.deepEqual(client.getHistory(), []);
  await client.chat('two');
  client.startConversation();
  assert.deepEqual(client.getHistory(), []);
});

test('analyzeContent picks the template and truncates the preview', async () => {
  const provider = new FakeProvider(['positive']);
  const client = makeClient(provider);
  const content = 'x'.repeat(150);
  const analysis = await client.analyzeContent(content, 'sentiment');
  assert.deepEqual(analysis, {
    analysisType: 'sentiment',
    contentPreview: `${'x'.repeat(100)}...`,
    result: 'positive'
  });
  assert.equal(provider.requests[0].prompt, `Analyze the sentiment of the following text:\n${content}`);
});

test('analyzeContent falls back to the general template for unknown types', async () => {
  const provider = new FakeProvider(['done']);
  const client = makeClient(provider);
  const analysis = await client.analyzeContent('short text', 'translation');
  assert.equal(analysis.analysisType, 'translation');
  assert.equal(analysis.contentPreview, 'short text');
  assert.equal(provider.requests[0].prompt, 'Analyze the following content:\nshort text');
});

test('preview keeps content of exactly 100 characters', () => {
  const content = 'y'.repeat(100);
  assert.equal(previewContent(content), content);
  assert.equal(previewContent(`${content}z`), `${content}...`);
});
