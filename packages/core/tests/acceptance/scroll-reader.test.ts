import { describe, it, expect, vi } from 'vitest';
import { ScrollReader } from '../../src/ScrollReader.js';
import { InMemoryQueryBackend } from '../../src/infrastructure/backends/InMemoryQueryBackend.js';
import type { InMemoryTable } from '../../src/infrastructure/backends/InMemoryQueryBackend.js';
import type { QueryBackend } from '../../src/domain/ports/QueryBackend.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import type { Page } from '../../src/domain/model/Page.js';
import { CorruptPageError, FetchError } from '../../src/domain/errors/ScrollSourceError.js';

const books: InMemoryTable = {
  columns: ['title', 'year'],
  columnTypes: ['string', 'int32'],
  rows: [
    { title: 'Dune', year: 1965 },
    { title: 'Emma', year: 1815 },
    { title: 'Ubik', year: 1969 },
    { title: 'Kindred', year: 1979 },
    { title: 'Beloved', year: 1987 },
    { title: 'Solaris', year: 1961 },
  ],
};

async function collect(reader: AsyncIterable<Page>): Promise<Page[]> {
  const pages: Page[] = [];
  for await (const page of reader) {
    pages.push(page);
  }
  return pages;
}

describe('ScrollReader', () => {
  describe('iteration', () => {
    it('should yield every non-empty page in order and stop at the empty one', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = new ScrollReader({ backend, index: 'books' });

      const pages = await collect(reader);

      expect(pages).toHaveLength(3);
      expect(pages.map((p) => p['title'])).toEqual([
        ['Dune', 'Emma'],
        ['Ubik', 'Kindred'],
        ['Beloved', 'Solaris'],
      ]);
      expect(pages[2]?.['year']).toEqual(new Int32Array([1987, 1961]));
      expect(backend.calls.filter((c) => c.method === 'next')).toHaveLength(4);
    });

    it('should fetch from the scroll URL of the selected node', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 4 });

      await collect(new ScrollReader({ backend, nodes: 'http://search-1:9200', index: 'books' }));

      expect(backend.calls.filter((c) => c.method === 'next').map((c) => c.url)).toEqual([
        'http://search-1:9200/_search/scroll',
        'http://search-1:9200/_search/scroll',
        'http://search-1:9200/_search/scroll',
      ]);
    });

    it('should emit events in lifecycle order', async () => {
      const reader = new ScrollReader({ backend: new InMemoryQueryBackend(books, { pageSize: 3 }), index: 'books' });
      const events: DomainEvent[] = [];
      reader.onAny((e) => events.push(e));

      await collect(reader);

      expect(events.map((e) => e.type)).toEqual([
        'node:connected',
        'page:fetched',
        'page:fetched',
        'source:exhausted',
        'source:closed',
      ]);
      expect(events[4]).toMatchObject({ type: 'source:closed', pagesRead: 2, rowsRead: 6 });
    });

    it('should release the scroll once and close when iteration ends', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = new ScrollReader({ backend, index: 'books' });

      await collect(reader);

      expect(backend.calls.filter((c) => c.method === 'release')).toHaveLength(1);
      expect(reader.getStatus()).toEqual({
        status: 'CLOSED',
        pagesRead: 3,
        rowsRead: 6,
        requestUrl: 'http://localhost:9200/books/_search?scroll=1m',
      });
    });

    it('should close the reader when the loop is left early', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = new ScrollReader({ backend, index: 'books' });

      for await (const page of reader) {
        expect(page['title']).toEqual(['Dune', 'Emma']);
        break;
      }

      expect(reader.getStatus().status).toBe('CLOSED');
      expect(backend.calls.filter((c) => c.method === 'release')).toHaveLength(1);
      expect(backend.calls.filter((c) => c.method === 'next')).toHaveLength(1);
    });

    it('should refuse to be iterated twice', async () => {
      const reader = new ScrollReader({ backend: new InMemoryQueryBackend(books), index: 'books' });
      await collect(reader);

      await expect(collect(reader)).rejects.toThrow('pages can only be iterated once');
    });

    it('should produce identical content from a reconstructed reader', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 4 });

      const first = await collect(new ScrollReader({ backend, index: 'books' }));
      const second = await collect(new ScrollReader({ backend, index: 'books' }));

      expect(second).toEqual(first);
    });
  });

  describe('produce()', () => {
    it('should return pages and then null once exhausted', async () => {
      const reader = await ScrollReader.open({ backend: new InMemoryQueryBackend(books, { pageSize: 4 }), index: 'books' });

      expect(reader.hasMore()).toBe(true);
      expect((await reader.produce())?.['title']).toEqual(['Dune', 'Emma', 'Ubik', 'Kindred']);
      expect((await reader.produce())?.['title']).toEqual(['Beloved', 'Solaris']);
      expect(await reader.produce()).toBeNull();
      expect(reader.hasMore()).toBe(false);
      expect(reader.getStatus().status).toBe('EXHAUSTED');
      expect(await reader.produce()).toBeNull();
    });

    it('should expose the session columns after open', async () => {
      const reader = await ScrollReader.open({ backend: new InMemoryQueryBackend(books), index: 'books' });

      expect(reader.columns).toEqual(['title', 'year']);
      expect(reader.columnTypes).toEqual(['string', 'int32']);
    });

    it('should require open() first', async () => {
      const reader = new ScrollReader({ backend: new InMemoryQueryBackend(books), index: 'books' });

      await expect(reader.produce()).rejects.toThrow('Call open() first');
      expect(() => reader.columns).toThrow('Call open() first');
    });

    it('should serve overlapping pulls one after another', async () => {
      const reader = await ScrollReader.open({ backend: new InMemoryQueryBackend(books, { pageSize: 2 }), index: 'books' });

      const [a, b] = await Promise.all([reader.produce(), reader.produce()]);

      expect(a?.['title']).toEqual(['Dune', 'Emma']);
      expect(b?.['title']).toEqual(['Ubik', 'Kindred']);
    });

    it('should treat a session without columns as exhausted without fetching', async () => {
      const backend = new InMemoryQueryBackend({ columns: [], columnTypes: [], rows: [] });
      const reader = await ScrollReader.open({ backend, index: 'empty' });

      expect(await reader.produce()).toBeNull();
      expect(reader.getStatus().status).toBe('EXHAUSTED');
      expect(backend.calls.filter((c) => c.method === 'next')).toHaveLength(0);
    });
  });

  describe('failures', () => {
    it('should fail on a fetch error without retrying or switching nodes', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = await ScrollReader.open({ backend, nodes: ['http://a:9200', 'http://b:9200'], index: 'books' });
      const failed = vi.fn();
      reader.on('source:failed', failed);

      await reader.produce();
      const next = vi
        .spyOn(backend, 'next')
        .mockRejectedValueOnce(new FetchError('HTTP 500 Internal Server Error', 'http://a:9200/_search/scroll', { status: 500 }));

      await expect(reader.produce()).rejects.toBeInstanceOf(FetchError);

      expect(next).toHaveBeenCalledOnce();
      expect(reader.getStatus().status).toBe('FAILED');
      expect(reader.hasMore()).toBe(false);
      expect(await reader.produce()).toBeNull();
      expect(backend.calls.filter((c) => c.method === 'open').every((c) => c.url.startsWith('http://a:9200'))).toBe(true);
      expect(failed).toHaveBeenCalledWith(
        expect.objectContaining({ error: 'HTTP 500 Internal Server Error', code: 'FETCH_FAILED' }),
      );
    });

    it('should end iteration with the fetch error and leave the reader failed', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = new ScrollReader({ backend, index: 'books' });
      vi.spyOn(backend, 'next').mockRejectedValue(new FetchError('socket hang up', 'http://localhost:9200/_search/scroll'));

      await expect(collect(reader)).rejects.toThrow('socket hang up');
      expect(reader.getStatus().status).toBe('FAILED');
      expect(backend.calls.filter((c) => c.method === 'release')).toHaveLength(0);
    });

    it('should complete a read whose scroll cannot be released at the end', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = new ScrollReader({ backend, index: 'books' });
      const release = vi
        .spyOn(backend, 'release')
        .mockRejectedValueOnce(
          new FetchError('HTTP 500 Internal Server Error for DELETE', 'http://localhost:9200/_search/scroll', { status: 500 }),
        );
      const events: DomainEvent[] = [];
      reader.onAny((e) => events.push(e));

      const pages = await collect(reader);

      expect(pages).toHaveLength(3);
      expect(release).toHaveBeenCalledOnce();
      expect(reader.getStatus().status).toBe('CLOSED');
      expect(events.map((e) => e.type).slice(-3)).toEqual(['source:exhausted', 'source:release-failed', 'source:closed']);
      expect(events.find((e) => e.type === 'source:release-failed')).toMatchObject({
        scrollUrl: 'http://localhost:9200/_search/scroll',
        error: 'HTTP 500 Internal Server Error for DELETE',
        code: 'FETCH_FAILED',
      });
    });

    it('should return null instead of failing when the final release fails', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 6 });
      vi.spyOn(backend, 'release').mockRejectedValueOnce(new Error('connection reset'));
      const reader = await ScrollReader.open({ backend, index: 'books' });

      expect((await reader.produce())?.['title']).toHaveLength(6);
      expect(await reader.produce()).toBeNull();
      expect(reader.getStatus().status).toBe('EXHAUSTED');
    });

    it('should reject a page whose columns have different lengths', async () => {
      const backend: QueryBackend = {
        open: () => Promise.resolve({ cursor: { scrollId: 's1' }, columns: ['a', 'b'], typeTags: ['DT_INT32', 'DT_INT32'] }),
        next: () => Promise.resolve({ cursor: { scrollId: 's2' }, values: [new Int32Array(0), new Int32Array([1, 2])] }),
      };
      const reader = await ScrollReader.open({ backend, index: 'letters' });

      await expect(reader.produce()).rejects.toThrow(CorruptPageError);
      expect(reader.getStatus().status).toBe('FAILED');
    });
  });

  describe('close()', () => {
    it('should release the scroll and report progress', async () => {
      const backend = new InMemoryQueryBackend(books, { pageSize: 2 });
      const reader = await ScrollReader.open({ backend, index: 'books' });
      const closed = vi.fn();
      reader.on('source:closed', closed);

      await reader.produce();
      await reader.close();
      await reader.close();

      expect(backend.calls.filter((c) => c.method === 'release')).toEqual([
        { method: 'release', url: 'http://localhost:9200/_search/scroll', scrollId: 'scroll-1' },
      ]);
      expect(closed).toHaveBeenCalledOnce();
      expect(closed).toHaveBeenCalledWith(expect.objectContaining({ pagesRead: 1, rowsRead: 2 }));
      expect(await reader.produce()).toBeNull();
    });

    it('should close a reader that was never opened without contacting the backend', async () => {
      const backend = new InMemoryQueryBackend(books);
      const reader = new ScrollReader({ backend, index: 'books' });

      await reader.close();

      expect(reader.getStatus().status).toBe('CLOSED');
      expect(backend.calls).toHaveLength(0);
    });
  });
});
