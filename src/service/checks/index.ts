import { aptSourcesCheck } from "./aptSources.ts";
import { inReleaseSignatureCheck } from "./inReleaseSignature.ts";
import { keyContentCheck } from "./keyContent.ts";
import { keyExpirationCheck } from "./keyExpiration.ts";
import { keyringFileCheck } from "./keyringFile.ts";
import { legacyAptKeyCheck } from "./legacyAptKey.ts";
import { networkConnectivityCheck } from "./networkConnectivity.ts";
import { systemInfoCheck } from "./systemInfo.ts";
import type { Check } from "./types.ts";

export type { Check, CheckContext } from "./types.ts";

/**
 * Every check, in the order they're reported. The order only affects
 * presentation.
 */
export const checks: readonly Check[] = [
  keyringFileCheck,
  keyContentCheck,
  keyExpirationCheck,
  aptSourcesCheck,
  networkConnectivityCheck,
  inReleaseSignatureCheck,
  legacyAptKeyCheck,
  systemInfoCheck,
];
