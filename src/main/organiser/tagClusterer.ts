import { compareStrings } from '../../common/paths';
import type { WeightedTag } from '../../types/providers';

export interface ClusterInput {
  path: string;
  tags: readonly WeightedTag[];
  embedding?: readonly number[];
}

export interface ClusterOptions {
  /** Smaller groups are folded into the fallback cluster */
  minClusterSize: number;
  fallbackKey: string;
  /** Let fallback members join the closest surviving cluster by embedding */
  useEmbeddings?: boolean;
  similarityThreshold?: number;
}

export interface Cluster {
  /** Winning tag shared by every member, or the fallback key */
  key: string;
  /** Heaviest tags across members, heaviest first */
  tags: string[];
  paths: string[];
  fallback: boolean;
}

interface Member {
  path: string;
  weights: Map<string, number>;
  embedding?: readonly number[];
}

const TOP_TAG_COUNT = 3;
const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

const normaliseTags = (tags: readonly WeightedTag[]) => {
  const weights = new Map<string, number>();
  tags.forEach(({ tag, weight }) => {
    const normalised = tag.trim().toLowerCase();
    if (!normalised || !Number.isFinite(weight)) return;
    weights.set(normalised, Math.max(weights.get(normalised) ?? Number.NEGATIVE_INFINITY, weight));
  });
  return weights;
};

/** Highest weight wins; equal weights go to the lexicographically smaller tag. */
export const winningTag = (weights: ReadonlyMap<string, number>): string | null => {
  let bestTag: string | null = null;
  let bestWeight = Number.NEGATIVE_INFINITY;
  for (const [tag, weight] of weights) {
    if (bestTag === null || weight > bestWeight || (weight === bestWeight && compareStrings(tag, bestTag) < 0)) {
      bestTag = tag;
      bestWeight = weight;
    }
  }
  return bestTag;
};

export const cosineSimilarity = (a: readonly number[], b: readonly number[]) => {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let index = 0; index < a.length; index += 1) {
    dot += a[index] * b[index];
    normA += a[index] * a[index];
    normB += b[index] * b[index];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

const centroidOf = (members: readonly Member[]): number[] | null => {
  const embeddings = members.flatMap((member) => (member.embedding ? [member.embedding] : []));
  if (embeddings.length === 0) return null;
  const dimension = embeddings[0].length;
  const usable = embeddings.filter((embedding) => embedding.length === dimension);
  const sum = new Array<number>(dimension).fill(0);
  usable.forEach((embedding) => embedding.forEach((value, index) => {
    sum[index] += value;
  }));
  return sum.map((value) => value / usable.length);
};

const topTags = (members: readonly Member[]) => {
  const totals = new Map<string, number>();
  members.forEach((member) =>
    member.weights.forEach((weight, tag) => totals.set(tag, (totals.get(tag) ?? 0) + weight)),
  );
  return [...totals.entries()]
    .sort((a, b) => b[1] - a[1] || compareStrings(a[0], b[0]))
    .slice(0, TOP_TAG_COUNT)
    .map(([tag]) => tag);
};

const toCluster = (key: string, members: readonly Member[], fallback: boolean): Cluster => ({
  key,
  tags: topTags(members),
  paths: members.map((member) => member.path).sort(compareStrings),
  fallback,
});

/**
 * Groups files by their winning tag. The result is sorted by key with the
 * fallback cluster last, and depends only on the inputs.
 */
export const clusterByTags = (inputs: readonly ClusterInput[], options: ClusterOptions): Cluster[] => {
  const fallbackKey = options.fallbackKey.trim().toLowerCase();
  const groups = new Map<string, Member[]>();
  let fallbackMembers: Member[] = [];

  [...inputs]
    .sort((a, b) => compareStrings(a.path, b.path))
    .forEach((input) => {
      const member: Member = { path: input.path, weights: normaliseTags(input.tags), embedding: input.embedding };
      const key = winningTag(member.weights);
      if (!key || key === fallbackKey) {
        fallbackMembers.push(member);
        return;
      }
      const group = groups.get(key) ?? [];
      group.push(member);
      groups.set(key, group);
    });

  const surviving: Array<{ key: string; members: Member[] }> = [];
  [...groups.keys()].sort(compareStrings).forEach((key) => {
    const members = groups.get(key) ?? [];
    if (members.length < options.minClusterSize) {
      fallbackMembers.push(...members);
    } else {
      surviving.push({ key, members });
    }
  });
  fallbackMembers.sort((a, b) => compareStrings(a.path, b.path));

  if (options.useEmbeddings && surviving.length > 0 && fallbackMembers.length > 0) {
    const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    // Centroids are fixed before any reassignment so member order cannot matter.
    const centroids = surviving.map((cluster) => centroidOf(cluster.members));
    const remaining: Member[] = [];
    fallbackMembers.forEach((member) => {
      let bestIndex = -1;
      let bestScore = Number.NEGATIVE_INFINITY;
      if (member.embedding) {
        centroids.forEach((centroid, index) => {
          if (!centroid || !member.embedding) return;
          const score = cosineSimilarity(member.embedding, centroid);
          if (score > bestScore) {
            bestScore = score;
            bestIndex = index;
          }
        });
      }
      if (bestIndex >= 0 && bestScore >= threshold) {
        surviving[bestIndex].members.push(member);
      } else {
        remaining.push(member);
      }
    });
    fallbackMembers = remaining;
  }

  const clusters = surviving.map(({ key, members }) => toCluster(key, members, false));
  if (fallbackMembers.length > 0) {
    clusters.push(toCluster(fallbackKey, fallbackMembers, true));
  }
  return clusters;
};
