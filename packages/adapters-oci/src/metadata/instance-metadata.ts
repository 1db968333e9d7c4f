/**
 * Instance Metadata Client
 *
 * Reads the instance's own identity from the OCI instance metadata service
 * (IMDS v2). Only reachable from inside the instance.
 */

import { z } from "zod";
import { ProviderError, ProviderErrorType } from "../errors/provider-error";
import type { InstanceMetadata } from "../types";

export const INSTANCE_METADATA_URL = "http://169.254.169.254/opc/v2/instance/";
const METADATA_TIMEOUT_MS = 10_000;

const InstanceMetadataResponseSchema = z
  .object({
    id: z.string().nullish(),
    compartmentId: z.string().nullish(),
    canonicalRegionName: z.string().nullish(),
    region: z.string().nullish(),
    regionInfo: z
      .object({
        regionIdentifier: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type InstanceMetadataResponse = z.infer<typeof InstanceMetadataResponseSchema>;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Pick the region identifier, preferring the canonical name.
 */
export function resolveRegion(metadata: InstanceMetadataResponse): string | undefined {
  return (
    metadata.canonicalRegionName ||
    metadata.regionInfo?.regionIdentifier ||
    metadata.region ||
    undefined
  );
}

export class InstanceMetadataClient {
  constructor(
    private readonly fetchFn: FetchFn = fetch,
    private readonly url: string = INSTANCE_METADATA_URL,
    private readonly timeoutMs: number = METADATA_TIMEOUT_MS
  ) {}

  async getInstanceMetadata(): Promise<InstanceMetadata> {
    const raw = await this.request();

    const parsed = InstanceMetadataResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected instance metadata response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
        ProviderErrorType.METADATA
      );
    }

    const metadata = parsed.data;
    const region = resolveRegion(metadata);
    if (!metadata.compartmentId || !region || !metadata.id) {
      throw new ProviderError(
        "Failed to obtain metadata (compartment, instance or region missing)",
        ProviderErrorType.METADATA,
        undefined,
        ["Run this command on the OCI instance that should receive the VNIC"]
      );
    }

    return {
      instanceId: metadata.id,
      compartmentId: metadata.compartmentId,
      region,
    };
  }

  private async request(): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(this.url, {
        headers: { Authorization: "Bearer Oracle" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(
        `Instance metadata service unreachable: ${message}`,
        ProviderErrorType.METADATA,
        error instanceof Error ? error : undefined,
        ["Run this command on the OCI instance that should receive the VNIC"]
      );
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ProviderError(
        `Instance metadata error: ${response.status} ${body}`,
        ProviderErrorType.METADATA
      );
    }

    return response.json();
  }
}
