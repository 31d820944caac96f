/**
 * Example 01: Basic Flow
 *
 * Demonstrates:
 * - Writing a node as prep / exec / post
 * - Chaining nodes and branching on an edge name
 * - Running the same flow synchronously and asynchronously
 */

import { FlowBuilder, Node, createRuntime } from '@stepwise/core';

interface Greeting {
  name: string;
  greeting?: string;
  result?: string;
}

// ── 1. Define nodes ─────────────────────────────────────────────
//
// prep reads from the shared context, exec does the work (and is the
// only part that may block or await), post writes back and picks the
// next edge.

const greet = new Node<Greeting, string, string>({
  id: 'greet',
  prep: ctx => ctx.name,
  exec: name => `Hello, ${name}!`,
  aexec: async name => `Hello, ${name}!`,
  post: (ctx, _name, greeting) => {
    ctx.greeting = greeting;
    return ctx.name.length > 8 ? 'long' : undefined;  // undefined follows 'default'
  },
  edges: ['long'],
});

const shout = new Node<Greeting, string, string>({
  id: 'shout',
  prep: ctx => ctx.greeting ?? '',
  exec: text => text.toUpperCase(),
  post: (ctx, _text, loud) => {
    ctx.result = loud;
    return undefined;
  },
});

const whisper = new Node<Greeting, string, string>({
  id: 'whisper',
  prep: ctx => ctx.greeting ?? '',
  exec: text => text.toLowerCase(),
  post: (ctx, _text, quiet) => {
    ctx.result = quiet;
    return undefined;
  },
});

// ── 2. Wire the graph ───────────────────────────────────────────

const runtime = createRuntime({ logLevel: 'warn' });

const flow = new FlowBuilder<Greeting>('hello')
  .node(greet)
  .node(shout)
  .node(whisper)
  .edge('greet', 'shout')              // default edge
  .edge('greet', 'whisper', 'long')
  .build(runtime);

// ── 3. Run it ───────────────────────────────────────────────────

async function main() {
  // Every node has a sync exec, so this runs with plain calls
  console.log(flow.runSync({ name: 'Ada' }).result);
  // → 'HELLO, ADA!'

  // Same definition under the async scheduler
  const ctx = await flow.run({ name: 'Grace Hopper' }, { mode: 'async' });
  console.log(ctx.result);
  // → 'hello, grace hopper!'

  console.log(flow.describe().edges);
  // → [{ from: 'greet', label: 'default', to: 'shout' }, { from: 'greet', label: 'long', to: 'whisper' }]
}

main().catch(console.error);
