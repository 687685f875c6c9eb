/**
 * Oracle tool catalog
 *
 * Each tool declares its parameter schema, the resource it maps to and the
 * shape of the oracle's answer. Parameters are validated before anything
 * touches the network.
 */

import { z } from 'zod';
import type { Hex } from 'viem';
import type { RequestDescription } from '../orchestrator/http.js';

export interface OracleEndpoints {
  visionUrl?: string;
  codeUrl?: string;
}

export interface OracleTool<P, R, T> {
  name: string;
  description: string;
  endpoint: keyof OracleEndpoints;
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  response: z.ZodType<R, z.ZodTypeDef, unknown>;
  buildRequest(baseUrl: string, params: P): RequestDescription;
  toResult(data: R, context: { fingerprint: Hex; params: P }): T;
}

export function defineOracleTool<P, R, T>(tool: OracleTool<P, R, T>): OracleTool<P, R, T> {
  return tool;
}

export const ENDPOINT_ENV: Record<keyof OracleEndpoints, string> = {
  visionUrl: 'VISION_ORACLE_URL',
  codeUrl: 'CODE_ORACLE_URL',
};

const numberish = z.union([z.number(), z.string()]);

// ============================================================================
// Asset verification
// ============================================================================

export interface AssetObservation {
  identifier: string;
  domain: 'ASSET_DOMAIN_VEHICLE';
  status: 'ASSET_STATUS_AVAILABLE';
  vehicle: {
    make: string;
    model: string;
    year: number;
    color: string;
  };
  metadata: {
    confidenceScore: string;
    estimatedPrice: string;
  };
}

const VisionObservationSchema = z
  .object({
    make: z.string().optional(),
    model: z.string().optional(),
    year: z.number().int().optional(),
    color: z.string().optional(),
    confidence_score: numberish.optional(),
    estimated_price: numberish.optional(),
  })
  .passthrough();

export const verifyAssetQuality = defineOracleTool({
  name: 'verify_asset_quality',
  description: 'Identify a vehicle from an image and report it as an asset observation',
  endpoint: 'visionUrl',
  params: z.object({
    imageUrl: z.string().url(),
  }),
  response: VisionObservationSchema,
  buildRequest: (baseUrl, params) => ({
    method: 'GET',
    url: `${baseUrl}/v1/assets/verify?image=${encodeURIComponent(params.imageUrl)}`,
    headers: { Accept: 'application/json' },
  }),
  toResult: (data, { fingerprint }): AssetObservation => ({
    identifier: `asset-${fingerprint.slice(2, 10)}`,
    domain: 'ASSET_DOMAIN_VEHICLE',
    status: 'ASSET_STATUS_AVAILABLE',
    vehicle: {
      make: data.make ?? 'Unknown',
      model: data.model ?? 'Unknown',
      year: data.year ?? 0,
      color: data.color ?? 'Unknown',
    },
    metadata: {
      confidenceScore: String(data.confidence_score ?? '0.0'),
      estimatedPrice: String(data.estimated_price ?? '0.0'),
    },
  }),
});

// ============================================================================
// Code appraisal
// ============================================================================

const PHI = 0.618;
const SIZE_DIVISOR = 1000;
const STARS_DIVISOR = 10;
const MIN_COMPLEXITY = 1;
const MAX_COMPLEXITY = 10;
const HIGH_QUALITY_THRESHOLD = 0.5;

export interface CodeAppraisal {
  repository: string;
  affinity: number;
  complexity: number;
  value: number;
  valuation: string;
  status: 'High-Quality Code-Honey Detected' | 'Low Affinity';
}

export interface RepositoryStats {
  matchedRequirements: number;
  totalRequirements: number;
  size: number;
  stargazersCount: number;
}

const GITHUB_OWNER = /^[A-Za-z0-9-]+$/;
const GITHUB_REPO = /^[A-Za-z0-9._-]+$/;

/**
 * `https://github.com/<owner>/<repo>[/...]` → owner and repo, or null
 */
export function parseGithubRepo(repoUrl: string): { owner: string; repo: string } | null {
  let url: URL;
  try {
    url = new URL(repoUrl);
  } catch {
    return null;
  }

  if (url.protocol !== 'https:' || (url.hostname !== 'github.com' && url.hostname !== 'www.github.com')) {
    return null;
  }

  const [owner, rawRepo] = url.pathname.split('/').filter(Boolean);
  if (!owner || !rawRepo) return null;

  const repo = rawRepo.replace(/\.git$/, '');
  if (!GITHUB_OWNER.test(owner) || !GITHUB_REPO.test(repo)) return null;

  return { owner, repo };
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function appraiseRepository(repository: string, stats: RepositoryStats): CodeAppraisal {
  const affinity = (stats.matchedRequirements / stats.totalRequirements) * PHI;
  const complexity = Math.min(
    MAX_COMPLEXITY,
    Math.max(MIN_COMPLEXITY, stats.size / SIZE_DIVISOR + stats.stargazersCount / STARS_DIVISOR),
  );
  const value = round(affinity * 100 + complexity * 10, 2);

  return {
    repository,
    affinity: round(affinity, 4),
    complexity: round(complexity, 2),
    value,
    valuation: `${value.toFixed(2)} SURGE`,
    status: affinity > HIGH_QUALITY_THRESHOLD ? 'High-Quality Code-Honey Detected' : 'Low Affinity',
  };
}

const RepositoryStatsSchema = z
  .object({
    matchedRequirements: z.number().int().nonnegative(),
    totalRequirements: z.number().int().positive(),
    size: z.number().nonnegative(),
    stargazersCount: z.number().int().nonnegative(),
  })
  .refine((stats) => stats.matchedRequirements <= stats.totalRequirements, {
    message: 'matchedRequirements exceeds totalRequirements',
  });

const RepoParamsSchema = z
  .object({
    repoUrl: z.string(),
  })
  .transform((params, ctx) => {
    const parsed = parseGithubRepo(params.repoUrl);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['repoUrl'],
        message: 'must be https://github.com/<owner>/<repo>',
      });
      return z.NEVER;
    }
    return parsed;
  });

export const appraiseCodeRepository = defineOracleTool({
  name: 'appraise_code_repository',
  description: 'Appraise a GitHub repository for requirement affinity and complexity',
  endpoint: 'codeUrl',
  params: RepoParamsSchema,
  response: RepositoryStatsSchema,
  buildRequest: (baseUrl, { owner, repo }) => ({
    method: 'GET',
    url: `${baseUrl}/v1/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/appraisal`,
    headers: { Accept: 'application/json' },
  }),
  toResult: (stats, { params }) => appraiseRepository(`${params.owner}/${params.repo}`, stats),
});
