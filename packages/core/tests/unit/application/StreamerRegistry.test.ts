import { describe, it, expect, vi } from 'vitest';
import { StreamerRegistry } from '../../../src/application/StreamerRegistry.js';
import { defineHandler } from '../../../src/domain/model/FormatHandler.js';
import { BufferByteStream } from '../../../src/infrastructure/bytes/BufferByteStream.js';
import {
  AlreadyGlobalFavoriteError,
  AmbiguousHandlerError,
  DuplicateRegistrationError,
  NoHandlerRegisteredError,
  NoStreamConstructorError,
  UnregisteredHandlerPreferenceError,
} from '../../../src/domain/errors/FormatStreamError.js';
import { ArrayValueStream } from '../../helpers/ArrayValueStream.js';

function spyLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('StreamerRegistry', () => {
  describe('register()', () => {
    it('should keep handlers in registration order', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');

      registry.register('text/x', h1);
      registry.register('text/x', h2);

      expect(registry.handlersFor('text/x')).toEqual([h1, h2]);
    });

    it('should reject the same handler twice for one format and leave the list unchanged', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      registry.register('text/x', h1);

      expect(() => registry.register('text/x', h1)).toThrow(DuplicateRegistrationError);
      expect(registry.handlersFor('text/x')).toHaveLength(1);
    });

    it('should allow the same handler under different formats', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');

      registry.register('text/x', h1);
      registry.register('text/y', h1);

      expect(registry.formats()).toEqual(['text/x', 'text/y']);
    });

    it('should log a multiplicity notice only from the second handler on', () => {
      const logger = spyLogger();
      const registry = new StreamerRegistry({ logger });

      registry.register('text/x', defineHandler('h1'));
      expect(logger.info).not.toHaveBeenCalled();

      registry.register('text/x', defineHandler('h2'));
      expect(logger.info).toHaveBeenCalledOnce();
      expect(logger.info).toHaveBeenCalledWith(
        { formatId: 'text/x', streamers: ['h1', 'h2'] },
        'text/x has multiple registered streamers',
      );
    });

    it('should treat handlers with equal names as distinct', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });

      registry.register('text/x', defineHandler('same'));
      registry.register('text/x', defineHandler('same'));

      expect(registry.handlersFor('text/x')).toHaveLength(2);
    });
  });

  describe('resolve()', () => {
    it('should return the only registered handler', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      registry.register('text/x', h1);

      expect(registry.resolve('text/x')).toBe(h1);
    });

    it('should throw NoHandlerRegistered for an unknown format', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });

      expect(() => registry.resolve('text/unknown')).toThrow(NoHandlerRegisteredError);
      expect(() => registry.resolve('text/unknown')).toThrow('no streamer registered for text/unknown');
    });

    it('should throw AmbiguousHandler naming every candidate', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');
      registry.register('text/x', h1);
      registry.register('text/x', h2);

      let caught: unknown;
      try {
        registry.resolve('text/x');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AmbiguousHandlerError);
      if (caught instanceof AmbiguousHandlerError) {
        expect(caught.candidates).toEqual([h1, h2]);
        expect(caught.code).toBe('AMBIGUOUS_HANDLER');
        expect(caught.message).toBe('multiple streamers registered for text/x: h1, h2. Prefer one of them.');
      }
    });

    it('should pick the single globally favored candidate', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');
      const h3 = defineHandler('h3');
      registry.register('text/x', h1);
      registry.register('text/x', h2);
      registry.register('text/x', h3);
      registry.setGlobalFavorite(h2);

      expect(registry.resolve('text/x')).toBe(h2);
    });

    it('should stay ambiguous when several candidates are globally favored', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');
      registry.register('text/x', h1);
      registry.register('text/x', h2);
      registry.setGlobalFavorite(h1);
      registry.setGlobalFavorite(h2);

      expect(() => registry.resolve('text/x')).toThrow(AmbiguousHandlerError);
    });

    it('should ignore global favorites that are not candidates', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const other = defineHandler('other');
      registry.register('text/x', defineHandler('h1'));
      registry.register('text/x', defineHandler('h2'));
      registry.setGlobalFavorite(other);

      expect(() => registry.resolve('text/x')).toThrow(AmbiguousHandlerError);
    });

    it('should let the per-format favorite win over a global favorite', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');
      registry.register('text/x', h1);
      registry.register('text/x', h2);
      registry.setGlobalFavorite(h2);
      registry.setFormatFavorite(h1, 'text/x');

      expect(registry.resolve('text/x')).toBe(h1);
    });
  });

  describe('tryResolve()', () => {
    it('should return the handler on success', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      registry.register('text/x', h1);

      expect(registry.tryResolve('text/x')).toEqual({ resolved: true, handler: h1 });
    });

    it('should return the failure instead of throwing', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });

      const result = registry.tryResolve('text/x');

      expect(result.resolved).toBe(false);
      if (!result.resolved) {
        expect(result.error.code).toBe('NO_HANDLER_REGISTERED');
        expect(result.error.formatId).toBe('text/x');
      }
    });
  });

  describe('setGlobalFavorite()', () => {
    it('should reject a handler that is already globally favored', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      registry.setGlobalFavorite(h1);

      expect(() => registry.setGlobalFavorite(h1)).toThrow(AlreadyGlobalFavoriteError);
      expect(registry.globalFavorites()).toEqual([h1]);
    });
  });

  describe('setFormatFavorite()', () => {
    it('should reject a handler not registered for the format and leave the registry unchanged', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');
      registry.register('text/x', h1);
      registry.register('text/y', h2);

      expect(() => registry.setFormatFavorite(h2, 'text/x')).toThrow(UnregisteredHandlerPreferenceError);
      expect(registry.favoriteFor('text/x')).toBeUndefined();
      expect(registry.handlersFor('text/x')).toEqual([h1]);
      expect(registry.resolve('text/x')).toBe(h1);
    });

    it('should replace an existing favorite with a warning', () => {
      const logger = spyLogger();
      const registry = new StreamerRegistry({ logger });
      const h1 = defineHandler('h1');
      const h2 = defineHandler('h2');
      registry.register('text/x', h1);
      registry.register('text/x', h2);

      registry.setFormatFavorite(h1, 'text/x');
      expect(logger.warn).not.toHaveBeenCalled();

      registry.setFormatFavorite(h2, 'text/x');
      expect(logger.warn).toHaveBeenCalledWith(
        { formatId: 'text/x', previous: 'h1', next: 'h2' },
        'replacing preferred streamer for text/x',
      );
      expect(registry.resolve('text/x')).toBe(h2);
    });

    it('should tolerate setting the same favorite twice', () => {
      const logger = spyLogger();
      const registry = new StreamerRegistry({ logger });
      const h1 = defineHandler('h1');
      registry.register('text/x', h1);

      registry.setFormatFavorite(h1, 'text/x');
      registry.setFormatFavorite(h1, 'text/x');

      expect(logger.warn).toHaveBeenCalledOnce();
      expect(registry.favoriteFor('text/x')).toBe(h1);
    });
  });

  describe('constructors', () => {
    it('should look up constructors by handler and format', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      const forX = vi.fn(() => new ArrayValueStream([{ n: 1 }]));
      const forY = vi.fn(() => new ArrayValueStream([{ n: 2 }]));
      registry.setConstructor(h1, 'text/x', forX);
      registry.setConstructor(h1, 'text/y', forY);

      const bytes = new BufferByteStream('');
      registry.constructorFor(h1, 'text/y')(h1, 'text/y', bytes, 'extra');

      expect(forY).toHaveBeenCalledWith(h1, 'text/y', bytes, 'extra');
      expect(forX).not.toHaveBeenCalled();
    });

    it('should throw NoStreamConstructor for a missing pair', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      registry.setConstructor(h1, 'text/x', () => new ArrayValueStream([]));

      expect(() => registry.constructorFor(h1, 'text/y')).toThrow(NoStreamConstructorError);
      expect(() => registry.constructorFor(defineHandler('h2'), 'text/x')).toThrow(
        'streamer h2 has no stream constructor for text/x',
      );
    });

    it('should warn when a constructor is replaced', () => {
      const logger = spyLogger();
      const registry = new StreamerRegistry({ logger });
      const h1 = defineHandler('h1');
      const second = () => new ArrayValueStream([]);

      registry.setConstructor(h1, 'text/x', () => new ArrayValueStream([]));
      registry.setConstructor(h1, 'text/x', second);

      expect(logger.warn).toHaveBeenCalledOnce();
      expect(registry.constructorFor(h1, 'text/x')).toBe(second);
    });
  });

  describe('scoped()', () => {
    it('should run the body against an empty registry and restore the previous state', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const kept = defineHandler('kept');
      const temporary = defineHandler('temporary');
      registry.register('text/x', kept);
      registry.setGlobalFavorite(kept);

      const seen = registry.scoped((r) => {
        expect(r.formats()).toEqual([]);
        expect(r.globalFavorites()).toEqual([]);
        r.register('text/x', temporary);
        r.register('text/z', temporary);
        return r.resolve('text/x');
      });

      expect(seen).toBe(temporary);
      expect(registry.handlersFor('text/x')).toEqual([kept]);
      expect(registry.handlersFor('text/z')).toEqual([]);
      expect(registry.globalFavorites()).toEqual([kept]);
    });

    it('should restore the previous state when the body throws', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const kept = defineHandler('kept');
      registry.register('text/x', kept);

      expect(() =>
        registry.scoped((r) => {
          r.register('text/x', defineHandler('temporary'));
          throw new Error('setup failed');
        }),
      ).toThrow('setup failed');

      expect(registry.handlersFor('text/x')).toEqual([kept]);
      expect(registry.resolve('text/x')).toBe(kept);
    });

    it('should restore after an async body settles', async () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const kept = defineHandler('kept');
      registry.register('text/x', kept);

      const count = await registry.scopedAsync(async (r) => {
        r.register('text/y', defineHandler('temporary'));
        await Promise.resolve();
        return r.formats().length;
      });

      expect(count).toBe(1);
      expect(registry.formats()).toEqual(['text/x']);
    });
  });

  describe('clear()', () => {
    it('should remove registrations, favorites and constructors', () => {
      const registry = new StreamerRegistry({ logger: spyLogger() });
      const h1 = defineHandler('h1');
      registry.register('text/x', h1);
      registry.setFormatFavorite(h1, 'text/x');
      registry.setGlobalFavorite(h1);
      registry.setConstructor(h1, 'text/x', () => new ArrayValueStream([]));

      registry.clear();

      expect(registry.formats()).toEqual([]);
      expect(registry.favoriteFor('text/x')).toBeUndefined();
      expect(registry.globalFavorites()).toEqual([]);
      expect(() => registry.constructorFor(h1, 'text/x')).toThrow(NoStreamConstructorError);
    });
  });
});
