import { ProviderError, ProviderErrorType } from "../errors/provider-error";
import {
  INSTANCE_METADATA_URL,
  InstanceMetadataClient,
  resolveRegion,
  type FetchFn,
} from "./instance-metadata";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("resolveRegion", () => {
  it("prefers the canonical region name", () => {
    expect(
      resolveRegion({
        canonicalRegionName: "us-ashburn-1",
        regionInfo: { regionIdentifier: "us-phoenix-1" },
        region: "iad",
      })
    ).toBe("us-ashburn-1");
  });

  it("falls back to regionInfo, then region", () => {
    expect(resolveRegion({ regionInfo: { regionIdentifier: "us-phoenix-1" }, region: "phx" })).toBe(
      "us-phoenix-1"
    );
    expect(resolveRegion({ region: "phx" })).toBe("phx");
    expect(resolveRegion({})).toBeUndefined();
  });
});

describe("InstanceMetadataClient", () => {
  it("reads the instance identity with the IMDS v2 header", async () => {
    const fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>().mockResolvedValue(
      jsonResponse({
        id: "ocid1.instance.oc1.iad.abcd1234",
        compartmentId: "ocid1.compartment.oc1..test",
        canonicalRegionName: "us-ashburn-1",
        shape: "VM.Standard.E4.Flex",
      })
    );

    const metadata = await new InstanceMetadataClient(fetchFn).getInstanceMetadata();

    expect(metadata).toEqual({
      instanceId: "ocid1.instance.oc1.iad.abcd1234",
      compartmentId: "ocid1.compartment.oc1..test",
      region: "us-ashburn-1",
    });
    expect(fetchFn.mock.calls[0]?.[0]).toBe(INSTANCE_METADATA_URL);
    expect(fetchFn.mock.calls[0]?.[1]?.headers).toEqual({ Authorization: "Bearer Oracle" });
  });

  it("fails when the compartment is missing", async () => {
    const fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>().mockResolvedValue(
      jsonResponse({ id: "ocid1.instance.oc1.iad.abcd1234", compartmentId: null, region: "iad" })
    );

    const error = await new InstanceMetadataClient(fetchFn).getInstanceMetadata().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect((error as ProviderError).type).toBe(ProviderErrorType.METADATA);
    expect((error as ProviderError).message).toBe(
      "Failed to obtain metadata (compartment, instance or region missing)"
    );
  });

  it("fails on a non-200 response", async () => {
    const fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>().mockResolvedValue(
      new Response("Not Found", { status: 404 })
    );

    await expect(new InstanceMetadataClient(fetchFn).getInstanceMetadata()).rejects.toThrow(
      "Instance metadata error: 404 Not Found"
    );
  });

  it("wraps connection failures", async () => {
    const fetchFn = jest
      .fn<ReturnType<FetchFn>, Parameters<FetchFn>>()
      .mockRejectedValue(new Error("connect EHOSTUNREACH 169.254.169.254:80"));

    const error = await new InstanceMetadataClient(fetchFn).getInstanceMetadata().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect((error as ProviderError).message).toBe(
      "Instance metadata service unreachable: connect EHOSTUNREACH 169.254.169.254:80"
    );
  });
});
