import assert from 'node:assert';
import { describe, it } from 'node:test';

import { parseLaunchLine } from '../src/engine/launch.js';
import { ConfigurationError } from '../src/lib/error.js';

describe('parseLaunchLine', () => {
  it('should split a linked line into one chain', () => {
    const chains = parseLaunchLine('videotestsrc num-buffers=10 ! videoconvert ! appsink');
    assert.strictEqual(chains.length, 1);
    assert.deepStrictEqual(
      chains[0].map((element) => element.factory),
      ['videotestsrc', 'videoconvert', 'appsink'],
    );
    assert.strictEqual(chains[0][0].properties.get('num-buffers'), '10');
    assert.strictEqual(chains[0][2].properties.size, 0);
  });

  it('should turn a bare caps string into a capsfilter', () => {
    const [chain] = parseLaunchLine('videotestsrc ! video/x-raw,format=GRAY8,width=64 ! appsink');
    assert.strictEqual(chain[1].factory, 'capsfilter');
    assert.strictEqual(chain[1].properties.get('caps'), 'video/x-raw,format=GRAY8,width=64');
  });

  it('should keep quoted values with spaces in one word', () => {
    const [chain] = parseLaunchLine('appsrc caps="video/x-raw, format=RGB, width=2, height=2" ! appsink');
    assert.strictEqual(chain[0].properties.get('caps'), 'video/x-raw, format=RGB, width=2, height=2');
  });

  it('should start a new chain for an element not following a link', () => {
    const chains = parseLaunchLine('videotestsrc ! fakesink audiotestsrc ! fakesink');
    assert.strictEqual(chains.length, 2);
    assert.deepStrictEqual(
      chains.map((chain) => chain.map((element) => element.factory)),
      [
        ['videotestsrc', 'fakesink'],
        ['audiotestsrc', 'fakesink'],
      ],
    );
  });

  it('should accept links without surrounding spaces', () => {
    const [chain] = parseLaunchLine('appsrc!appsink');
    assert.deepStrictEqual(
      chain.map((element) => element.factory),
      ['appsrc', 'appsink'],
    );
  });

  it('should reject malformed lines', () => {
    for (const description of ['', '   ', '! appsink', 'appsrc !', 'appsrc ! ! appsink', 'num-buffers=3 appsink', 'appsrc ! 9lives', 'appsrc caps="video/x-raw']) {
      assert.throws(() => parseLaunchLine(description), ConfigurationError, `description '${description}'`);
    }
  });
});
