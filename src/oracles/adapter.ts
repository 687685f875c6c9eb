/**
 * Oracle Tool Adapter
 *
 * Maps domain parameters to a canonical request, runs it through the
 * orchestrator (which pays when asked to) and maps the HTTP answer back to
 * domain types. Every failure comes back as a categorized PaygateError.
 */

import { PaygateError, PaygateErrorCode, toPaygateError } from '../errors.js';
import type { ExecuteOptions, RequestOrchestrator } from '../orchestrator/orchestrator.js';
import type { PaymentReceipt } from '../x402/types.js';
import {
  ENDPOINT_ENV,
  appraiseCodeRepository,
  verifyAssetQuality,
  type AssetObservation,
  type CodeAppraisal,
  type OracleEndpoints,
  type OracleTool,
} from './catalog.js';

export type ToolCallResult<T> =
  | { ok: true; tool: string; data: T; payment?: PaymentReceipt }
  | { ok: false; tool: string; error: PaygateError };

export const ORACLE_TOOL_NAMES = [verifyAssetQuality.name, appraiseCodeRepository.name];

function failure(tool: string, error: PaygateError): { ok: false; tool: string; error: PaygateError } {
  return { ok: false, tool, error };
}

export class OracleToolAdapter {
  constructor(
    private readonly orchestrator: RequestOrchestrator,
    private readonly endpoints: OracleEndpoints,
    private readonly executeOptions: ExecuteOptions = {},
  ) {}

  /** `params` is validated against the tool's schema: `{ imageUrl }` */
  verifyAssetQuality(params: unknown): Promise<ToolCallResult<AssetObservation>> {
    return this.invoke(verifyAssetQuality, params);
  }

  /** `params` is validated against the tool's schema: `{ repoUrl }` */
  appraiseCodeRepository(params: unknown): Promise<ToolCallResult<CodeAppraisal>> {
    return this.invoke(appraiseCodeRepository, params);
  }

  /**
   * Dispatch by tool name
   */
  async call(name: string, params: unknown): Promise<ToolCallResult<unknown>> {
    switch (name) {
      case verifyAssetQuality.name:
        return this.invoke(verifyAssetQuality, params);
      case appraiseCodeRepository.name:
        return this.invoke(appraiseCodeRepository, params);
      default:
        return failure(
          name,
          new PaygateError(PaygateErrorCode.VALIDATION, `Unknown oracle tool: ${name}`, undefined, {
            available: ORACLE_TOOL_NAMES,
          }),
        );
    }
  }

  private async invoke<P, R, T>(tool: OracleTool<P, R, T>, rawParams: unknown): Promise<ToolCallResult<T>> {
    const params = tool.params.safeParse(rawParams);
    if (!params.success) {
      const issues = params.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`);
      return failure(
        tool.name,
        new PaygateError(PaygateErrorCode.VALIDATION, `Invalid parameters for ${tool.name}: ${issues.join('; ')}`),
      );
    }

    const baseUrl = this.endpoints[tool.endpoint];
    if (!baseUrl) {
      return failure(
        tool.name,
        new PaygateError(
          PaygateErrorCode.VALIDATION,
          `${tool.name} has no oracle endpoint configured`,
          `Set ${ENDPOINT_ENV[tool.endpoint]}.`,
        ),
      );
    }

    const request = tool.buildRequest(baseUrl.replace(/\/+$/, ''), params.data);

    try {
      const response = await this.orchestrator.execute(request, this.executeOptions);

      if (response.status < 200 || response.status >= 300) {
        return failure(
          tool.name,
          new PaygateError(
            PaygateErrorCode.PROTOCOL_VIOLATION,
            `${tool.name} oracle answered HTTP ${response.status}`,
            undefined,
            { body: response.body },
          ),
        );
      }

      const data = tool.response.safeParse(response.body);
      if (!data.success) {
        return failure(
          tool.name,
          new PaygateError(
            PaygateErrorCode.PROTOCOL_VIOLATION,
            `${tool.name} oracle returned an unexpected response shape`,
            undefined,
            { issues: data.error.issues.map((issue) => issue.message) },
          ),
        );
      }

      return {
        ok: true,
        tool: tool.name,
        data: tool.toResult(data.data, { fingerprint: response.fingerprint, params: params.data }),
        payment: response.payment,
      };
    } catch (error) {
      return failure(tool.name, toPaygateError(error));
    }
  }
}
