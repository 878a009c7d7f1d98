import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadListing, parseListing } from '../src/listing.js';
import { sampleListing, writeListing } from './helpers/listing.js';
import { withTempDir } from './helpers/temp-dir.js';

describe('parseListing', () => {
  it('defaults missing arrays to empty', () => {
    expect(parseListing({})).toEqual({ Versions: [], DeleteMarkers: [] });
  });

  it('drops fields the report does not use', () => {
    const listing = parseListing({
      Versions: [
        {
          Key: 'a.txt',
          LastModified: '2024-01-01T00:00:00.000Z',
          Size: 10,
          IsLatest: true,
          ETag: '"abc"',
          StorageClass: 'STANDARD',
        },
      ],
      RequestCharged: null,
    });

    expect(listing.Versions).toEqual([
      { Key: 'a.txt', LastModified: '2024-01-01T00:00:00.000Z', Size: 10, IsLatest: true },
    ]);
  });

  it('names the failing paths', () => {
    expect(() => parseListing({ Versions: [{ Key: 'a.txt', LastModified: '2024-01-01', IsLatest: true }] }, 'x.json')).toThrow(
      'Invalid bucket listing in x.json: Versions.0.Size: Required'
    );
  });

  it('rejects a document that is not an object', () => {
    expect(() => parseListing([])).toThrow('Invalid bucket listing in listing: (root):');
  });
});

describe('loadListing', () => {
  it('reads and validates a listing file', async () => {
    await withTempDir('listing-test-', async (dir) => {
      const file = await writeListing(dir, 'my-bucket.json');

      const listing = await loadListing(file);

      expect(listing.Versions).toHaveLength(sampleListing.Versions.length);
      expect(listing.DeleteMarkers).toHaveLength(sampleListing.DeleteMarkers.length);
    });
  });

  it('fails on a missing file', async () => {
    await withTempDir('listing-test-', async (dir) => {
      const file = path.join(dir, 'nope.json');
      await expect(loadListing(file)).rejects.toThrow(`File not found: ${file}`);
    });
  });

  it('fails on an empty file', async () => {
    await withTempDir('listing-test-', async (dir) => {
      const file = path.join(dir, 'empty.json');
      await writeFile(file, '');
      await expect(loadListing(file)).rejects.toThrow(`Corrupted JSON file (empty): ${file}`);
    });
  });

  it('fails on invalid JSON', async () => {
    await withTempDir('listing-test-', async (dir) => {
      const file = path.join(dir, 'broken.json');
      await writeFile(file, '{"Versions": [');
      await expect(loadListing(file)).rejects.toThrow(`Corrupted JSON file: ${file}`);
    });
  });
});
