/**
 * Bucket Usage Statistics
 *
 * Merges a bucket's object versions with its delete markers and totals up
 * the space held by present and deleted files.
 */

import type { DeleteMarker, Listing, ObjectVersion } from './listing.js';
import type { DeleteMarkerSummary, ObjectSummary, UsageStats, VersionSummary } from './types.js';

/**
 * Folders are keys ending in a slash. They hold no data.
 */
export function isFolder(key: string): boolean {
  return key.endsWith('/');
}

/**
 * Compare two LastModified timestamps; unparseable values fall back to string order
 */
export function isNewer(candidate: string, current: string): boolean {
  const a = Date.parse(candidate);
  const b = Date.parse(current);
  if (Number.isFinite(a) && Number.isFinite(b)) {
    return a > b;
  }
  return candidate > current;
}

function average(total: number, count: number): number {
  return count > 0 ? total / count : 0;
}

export function summarizeDeleteMarkers(markers: DeleteMarker[]): Map<string, DeleteMarkerSummary> {
  const summaries = new Map<string, DeleteMarkerSummary>();

  for (const marker of markers) {
    const existing = summaries.get(marker.Key);
    if (!existing) {
      summaries.set(marker.Key, { latestModified: marker.LastModified });
    } else if (isNewer(marker.LastModified, existing.latestModified)) {
      existing.latestModified = marker.LastModified;
    }
  }

  return summaries;
}

export function summarizeVersions(versions: ObjectVersion[]): Map<string, VersionSummary> {
  const summaries = new Map<string, VersionSummary>();

  for (const version of versions) {
    let summary = summaries.get(version.Key);
    if (!summary) {
      summary = {
        latestModified: version.LastModified,
        totalSize: version.Size,
        numVersions: 1,
        averageSize: 0,
      };
      summaries.set(version.Key, summary);
    } else {
      summary.totalSize += version.Size;
      summary.numVersions += 1;
      if (isNewer(version.LastModified, summary.latestModified)) {
        summary.latestModified = version.LastModified;
      }
    }

    // The current version is what the bucket "shows" for this key
    if (version.IsLatest && !isFolder(version.Key)) {
      summary.latestSize = version.Size;
    }
  }

  for (const summary of summaries.values()) {
    summary.averageSize = average(summary.totalSize, summary.numVersions);
  }

  return summaries;
}

/**
 * One entry per key. A key is deleted when its newest delete marker is newer
 * than its newest version, or when it only has delete markers left (older
 * versions aged out by lifecycle policy or removed by hand).
 */
export function combineObjects(
  deleteMarkers: Map<string, DeleteMarkerSummary>,
  versions: Map<string, VersionSummary>
): Map<string, ObjectSummary> {
  const objects = new Map<string, ObjectSummary>();

  for (const [key, version] of versions) {
    const marker = deleteMarkers.get(key);
    const deletedAt =
      marker && isNewer(marker.latestModified, version.latestModified) ? marker.latestModified : undefined;

    objects.set(key, {
      ...version,
      latestModified: deletedAt ?? version.latestModified,
      status: deletedAt ? 'deleted' : 'present',
      isFolder: isFolder(key),
    });
  }

  for (const [key, marker] of deleteMarkers) {
    if (versions.has(key)) continue;
    objects.set(key, {
      latestModified: marker.latestModified,
      totalSize: 0,
      numVersions: 0,
      averageSize: 0,
      status: 'deleted',
      isFolder: isFolder(key),
    });
  }

  return objects;
}

export function computeUsageStats(objects: Map<string, ObjectSummary>): UsageStats {
  const stats: UsageStats = {
    present: { numFiles: 0, numVersions: 0, totalSize: 0, averageSize: 0, latestSize: 0, pctUsedByLatest: 0 },
    deleted: { numFiles: 0, numVersions: 0, totalSize: 0, averageSize: 0 },
  };

  for (const object of objects.values()) {
    if (object.isFolder) continue;

    if (object.status === 'present') {
      stats.present.numFiles += 1;
      stats.present.numVersions += object.numVersions;
      stats.present.totalSize += object.totalSize;
      stats.present.latestSize += object.latestSize ?? 0;
    } else {
      stats.deleted.numFiles += 1;
      stats.deleted.numVersions += object.numVersions;
      stats.deleted.totalSize += object.totalSize;
    }
  }

  stats.present.averageSize = average(stats.present.totalSize, stats.present.numVersions);
  stats.deleted.averageSize = average(stats.deleted.totalSize, stats.deleted.numVersions);

  if (stats.present.totalSize > 0) {
    const pct = (stats.present.latestSize / stats.present.totalSize) * 100;
    stats.present.pctUsedByLatest = Math.round(pct * 100) / 100;
  }

  return stats;
}

export function summarizeListing(listing: Listing): UsageStats {
  const deleteMarkers = summarizeDeleteMarkers(listing.DeleteMarkers);
  const versions = summarizeVersions(listing.Versions);
  return computeUsageStats(combineObjects(deleteMarkers, versions));
}
