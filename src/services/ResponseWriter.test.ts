import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'stream';
import { ResponseWriter } from './ResponseWriter.js';
import { CapturedOutput } from '../test/protocolHarness.js';
import { ResponseEncodeError } from '../utils/errorHandler.js';

describe('ResponseWriter', () => {
  it('should write each response as one line', async () => {
    const output = new CapturedOutput();
    const writer = new ResponseWriter(output.stream);

    await writer.send({});
    await writer.send({ event: 'progress', oid: 'abcd', bytesSoFar: 3, bytesSinceLast: 3 });
    await writer.send({ event: 'complete', oid: 'abcd' });

    expect(output.text).toBe(
      '{}\n' +
        '{"event":"progress","oid":"abcd","bytesSoFar":3,"bytesSinceLast":3}\n' +
        '{"event":"complete","oid":"abcd"}\n'
    );
  });

  it('should wait for a full stream to drain before resolving', async () => {
    const output = new PassThrough({ highWaterMark: 8 });
    const writer = new ResponseWriter(output);
    let resolved = false;

    const sending = writer.send({ event: 'complete', oid: 'abcdef0123456789' }).then(() => {
      resolved = true;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(resolved).toBe(false);

    output.resume();
    await sending;
    expect(resolved).toBe(true);
  });

  it('should reject once the output has been closed', async () => {
    const output = new PassThrough();
    output.end();
    const writer = new ResponseWriter(output);

    await expect(writer.send({})).rejects.toThrow(ResponseEncodeError);
  });

  it('should reject when the underlying write fails', async () => {
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    const writer = new ResponseWriter(output);

    await expect(writer.send({})).rejects.toThrow('Unable to write response');
    await expect(writer.send({})).rejects.toThrow(ResponseEncodeError);
  });
});
