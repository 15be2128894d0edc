import type { LayoutErrorCode } from "@roomforge/contracts";
import type { LayoutStateArtifact, PassContext } from "../../pipeline/types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Record a degradation on the layout state. Generation carries on; the
 * diagnostic ends up on the published layout and in the trace.
 */
export function reportDiagnostic(
  state: LayoutStateArtifact,
  ctx: PassContext,
  passId: string,
  code: LayoutErrorCode,
  message: string,
  details?: Record<string, unknown>,
): LayoutStateArtifact {
  ctx.trace.warning(passId, `${code}: ${message}`);
  if (DEV_MODE) {
    console.warn(`[layout] ${passId}: ${message}`);
  }
  return {
    ...state,
    diagnostics: [
      ...state.diagnostics,
      {
        code,
        message,
        severity: "warning",
        passId,
        ...(details ? { details } : {}),
      },
    ],
  };
}
