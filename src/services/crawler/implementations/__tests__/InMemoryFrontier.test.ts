import { InMemoryFrontier } from '../InMemoryFrontier';

describe('InMemoryFrontier', () => {
  let frontier: InMemoryFrontier;

  beforeEach(() => {
    frontier = new InMemoryFrontier();
  });

  describe('add', () => {
    it('should add entries to the queue', () => {
      frontier.add({ url: 'https://example.com/a', parentUrl: 'https://example.com/', depth: 1 });
      expect(frontier.size()).toBe(1);
    });

    it('should skip URLs that were already visited', () => {
      frontier.markVisited('https://example.com/a');
      frontier.add({ url: 'https://example.com/a', parentUrl: '', depth: 1 });
      expect(frontier.size()).toBe(0);
    });

    it('should skip invalid URLs', () => {
      frontier.add({ url: 'not a url', parentUrl: '', depth: 1 });
      expect(frontier.size()).toBe(0);
    });

    it('should keep URLs exactly as given', () => {
      frontier.add({ url: 'https://example.com/path/', parentUrl: '', depth: 1 });
      frontier.add({ url: 'https://example.com/path', parentUrl: '', depth: 1 });
      expect(frontier.getNext()?.url).toBe('https://example.com/path/');
      expect(frontier.getNext()?.url).toBe('https://example.com/path');
    });

    it('should not be affected by later changes to the added entry', () => {
      const entry = { url: 'https://example.com/a', parentUrl: '', depth: 1 };
      frontier.add(entry);
      entry.depth = 5;
      expect(frontier.getNext()).toEqual({ url: 'https://example.com/a', parentUrl: '', depth: 1 });
    });
  });

  describe('addBulk', () => {
    it('should add entries in order and drop visited ones', () => {
      frontier.markVisited('https://example.com/2');
      frontier.addBulk([
        { url: 'https://example.com/1', parentUrl: 'https://example.com/', depth: 1 },
        { url: 'https://example.com/2', parentUrl: 'https://example.com/', depth: 1 },
        { url: 'https://example.com/3', parentUrl: 'https://example.com/', depth: 1 }
      ]);

      expect(frontier.size()).toBe(2);
      expect(frontier.getNext()?.url).toBe('https://example.com/1');
      expect(frontier.getNext()?.url).toBe('https://example.com/3');
    });
  });

  describe('getNext', () => {
    it('should return null when the queue is empty', () => {
      expect(frontier.getNext()).toBeNull();
    });

    it('should maintain FIFO order across depths', () => {
      const entries = [
        { url: 'https://example.com/deep', parentUrl: 'https://example.com/b', depth: 2 },
        { url: 'https://example.com/', parentUrl: '', depth: 0 },
        { url: 'https://example.com/b', parentUrl: 'https://example.com/', depth: 1 }
      ];
      frontier.addBulk(entries);

      for (const expected of entries) {
        expect(frontier.getNext()).toEqual(expected);
      }
      expect(frontier.size()).toBe(0);
    });
  });

  describe('visited set', () => {
    it('should count each visited URL once', () => {
      frontier.markVisited('https://example.com/1');
      frontier.markVisited('https://example.com/1');
      frontier.markVisited('https://example.com/2');

      expect(frontier.visitedCount()).toBe(2);
      expect(frontier.isVisited('https://example.com/2')).toBe(true);
      expect(frontier.isVisited('https://example.com/3')).toBe(false);
    });

    it('should leave already queued entries in place when marked visited', () => {
      frontier.add({ url: 'https://example.com/1', parentUrl: '', depth: 1 });
      frontier.markVisited('https://example.com/1');
      expect(frontier.size()).toBe(1);
    });
  });

  describe('clear', () => {
    it('should clear both queue and visited URLs', () => {
      frontier.add({ url: 'https://example.com/1', parentUrl: '', depth: 1 });
      frontier.markVisited('https://example.com/2');

      frontier.clear();

      expect(frontier.size()).toBe(0);
      expect(frontier.visitedCount()).toBe(0);
      expect(frontier.isVisited('https://example.com/2')).toBe(false);
    });
  });
});
