import { describe, it, expect } from 'vitest';
import { BufferByteStream, eachValue, NotWritableError } from '@formatstreams/core';
import { NdjsonStream } from '../../src/infrastructure/streams/NdjsonStream.js';

function writableBytes(content: string): BufferByteStream {
  return new BufferByteStream(content, { name: 'events.ndjson', writable: true });
}

describe('NdjsonStream', () => {
  describe('reading', () => {
    it('should read one object per line, ignoring blank lines', () => {
      const stream = new NdjsonStream(new BufferByteStream('{"id":1}\n\n  {"id":2}  \n'));

      expect([...eachValue(stream)]).toEqual([{ id: 1 }, { id: 2 }]);
    });

    it('should load every record whatever the cursor of the byte stream', () => {
      const bytes = writableBytes('{"id":1}\n{"id":2}\n');
      bytes.seek(bytes.contents().length);

      const stream = new NdjsonStream(bytes);
      stream.seekEnd();
      stream.write({ id: 3 });
      stream.close();

      expect(bytes.contents().toString('utf-8')).toBe('{"id":1}\n{"id":2}\n{"id":3}\n');
    });

    it('should name the line holding invalid JSON', () => {
      const bytes = new BufferByteStream('{"id":1}\nnot json\n', { name: 'events.ndjson' });

      expect(() => new NdjsonStream(bytes)).toThrow('events.ndjson: invalid JSON on line 2');
    });

    it('should reject a line that is not an object', () => {
      expect(() => new NdjsonStream(new BufferByteStream('[1]\n'))).toThrow('NDJSON data: line 1 must be a plain object');
    });
  });

  describe('writing', () => {
    it('should append at the end and rewrite the bytes on close', () => {
      const bytes = writableBytes('{"id":1}\n{"id":2}\n');
      const stream = new NdjsonStream(bytes);

      stream.seekEnd();
      stream.write({ id: 3 });
      expect(stream.length()).toBe(3);
      expect(stream.position()).toBe(3);
      stream.close();

      expect(bytes.closed).toBe(true);
      expect(bytes.contents().toString('utf-8')).toBe('{"id":1}\n{"id":2}\n{"id":3}\n');
    });

    it('should overwrite the record at the cursor', () => {
      const bytes = writableBytes('{"id":1}\n{"id":2}\n');
      const stream = new NdjsonStream(bytes);

      stream.seek(1);
      stream.write({ id: 20, note: 'edited' });
      stream.close();

      expect(bytes.contents().toString('utf-8')).toBe('{"id":1}\n{"id":20,"note":"edited"}\n');
    });

    it('should truncate to the given number of records', () => {
      const bytes = writableBytes('{"id":1}\n{"id":2}\n{"id":3}\n');
      const stream = new NdjsonStream(bytes);

      stream.seekEnd();
      stream.truncate(1);
      expect(stream.position()).toBe(1);
      expect(stream.eof()).toBe(true);
      stream.close();

      expect(bytes.contents().toString('utf-8')).toBe('{"id":1}\n');
    });

    it('should leave empty bytes after truncating everything', () => {
      const bytes = writableBytes('{"id":1}\n');
      const stream = new NdjsonStream(bytes);

      stream.truncate(0);
      stream.close();

      expect(bytes.contents().length).toBe(0);
    });

    it('should reject a negative or fractional length', () => {
      const stream = new NdjsonStream(writableBytes(''));

      expect(() => stream.truncate(-1)).toThrow(RangeError);
      expect(() => stream.truncate(1.5)).toThrow(RangeError);
    });

    it('should not touch the bytes when nothing changed', () => {
      const bytes = writableBytes('{"id":1}   \n');
      const stream = new NdjsonStream(bytes);

      stream.close();

      expect(bytes.contents().toString('utf-8')).toBe('{"id":1}   \n');
    });

    it('should refuse to write to a read-only byte stream', () => {
      const stream = new NdjsonStream(new BufferByteStream('{"id":1}\n', { name: 'ro.ndjson' }));

      expect(() => stream.write({ id: 2 })).toThrow(NotWritableError);
      expect(() => stream.truncate(0)).toThrow('ro.ndjson was not opened for writing');
    });
  });
});
