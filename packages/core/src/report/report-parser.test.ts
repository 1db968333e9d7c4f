import {
  DEFAULT_PARSER_OPTIONS,
  extractSectionLines,
  parseAgentReport,
  parseRow,
  tokenize,
} from "./report-parser";

const TABLE_HEADER =
  "CONFIG  ADDR       SPREFIX   SBITS  VIRTRT  NS  IND  IFACE  VLTAG  VLAN  STATE  MAC                VNIC";
const ENS3_ROW =
  "-       10.0.0.94  10.0.0.0  24     -       -   2    ens3   -      -     UP     02:00:17:00:57:6a  ocid1.vnic.oc1..aaaa";
const ENS5_ROW =
  "ADD     10.0.1.17  10.0.1.0  24     -       -   3    ens5   -      -     UP     02:00:17:00:11:22  ocid1.vnic.oc1..bbbb";
const ENS5_PENDING_ROW =
  "ADD     -          10.0.1.0  24     -       -   3    ens5   -      -     UP     02:00:17:00:11:22  ocid1.vnic.oc1..bbbb";

function report(...sections: string[][]): string {
  return sections.map((lines) => lines.join("\n")).join("\n\n");
}

describe("tokenize", () => {
  it("splits on runs of whitespace", () => {
    expect(tokenize("  a \t b   c ")).toEqual(["a", "b", "c"]);
  });

  it("returns no tokens for a whitespace-only line", () => {
    expect(tokenize(" \t ")).toEqual([]);
  });
});

describe("extractSectionLines", () => {
  it("returns lines after the header up to the first blank line", () => {
    const raw = report(
      ["Cloud network configuration:", "ignored line"],
      ["Operating System level network configuration:", TABLE_HEADER, ENS3_ROW],
      ["Trailing block", ENS5_ROW]
    );

    expect(extractSectionLines(raw, DEFAULT_PARSER_OPTIONS.sectionHeader)).toEqual([
      TABLE_HEADER,
      ENS3_ROW,
    ]);
  });

  it("treats a whitespace-only line as the end of the section", () => {
    const raw = [
      "Operating System level network configuration:",
      ENS3_ROW,
      "   ",
      ENS5_ROW,
    ].join("\n");

    expect(extractSectionLines(raw, DEFAULT_PARSER_OPTIONS.sectionHeader)).toEqual([ENS3_ROW]);
  });

  it("handles CRLF line endings", () => {
    const raw = ["Operating System level network configuration:", ENS3_ROW, "", ENS5_ROW].join(
      "\r\n"
    );

    expect(extractSectionLines(raw, DEFAULT_PARSER_OPTIONS.sectionHeader)).toEqual([ENS3_ROW]);
  });

  it("returns nothing when the header is missing", () => {
    expect(extractSectionLines(ENS3_ROW, DEFAULT_PARSER_OPTIONS.sectionHeader)).toEqual([]);
  });
});

describe("parseRow", () => {
  it("reads the interface name from column 8 and the IP from column 2", () => {
    expect(parseRow(tokenize(ENS3_ROW))).toEqual({ name: "ens3", expectedIp: "10.0.0.94" });
  });

  it("maps the '-' marker to a null expected IP", () => {
    expect(parseRow(tokenize(ENS5_PENDING_ROW))).toEqual({ name: "ens5", expectedIp: null });
  });

  it("rejects rows with fewer than 8 columns", () => {
    expect(parseRow(["-", "10.0.0.94", "10.0.0.0", "24", "-", "-", "2"])).toBeNull();
  });

  it("accepts a row with exactly 8 columns", () => {
    expect(parseRow(["-", "10.1.2.3", "10.1.2.0", "24", "-", "-", "2", "eth0"])).toEqual({
      name: "eth0",
      expectedIp: "10.1.2.3",
    });
  });

  it("rejects the table header and virtual interfaces", () => {
    expect(parseRow(tokenize(TABLE_HEADER))).toBeNull();
    expect(parseRow(["-", "10.0.0.5", "10.0.0.0", "24", "-", "-", "4", "docker0"])).toBeNull();
    expect(parseRow(["-", "10.0.0.5", "10.0.0.0", "24", "-", "-", "4", "vlan.100"])).toBeNull();
  });

  it.each(["ens3", "enp0s6", "eno1", "eth1"])("accepts the %s prefix", (name) => {
    expect(parseRow(["-", "10.0.0.5", "10.0.0.0", "24", "-", "-", "4", name])?.name).toBe(name);
  });

  it("honours custom prefixes and column minimums", () => {
    const options = { ...DEFAULT_PARSER_OPTIONS, interfacePrefixes: ["wlan"], minColumns: 9 };

    expect(parseRow(["-", "10.0.0.5", "a", "b", "c", "d", "e", "wlan0"], options)).toBeNull();
    expect(parseRow(["-", "10.0.0.5", "a", "b", "c", "d", "e", "wlan0", "x"], options)).toEqual({
      name: "wlan0",
      expectedIp: "10.0.0.5",
    });
    expect(parseRow(["-", "10.0.0.5", "a", "b", "c", "d", "e", "ens3", "x"], options)).toBeNull();
  });
});

describe("parseAgentReport", () => {
  it("returns typed rows in report order with the raw block", () => {
    const raw = report(
      ["Network configuration ran. Info:"],
      ["Operating System level network configuration:", TABLE_HEADER, ENS3_ROW, ENS5_ROW]
    );

    const parsed = parseAgentReport(raw);

    expect(parsed).toEqual({
      kind: "rows",
      block: [TABLE_HEADER, ENS3_ROW, ENS5_ROW].join("\n"),
      rows: [
        { name: "ens3", expectedIp: "10.0.0.94" },
        { name: "ens5", expectedIp: "10.0.1.17" },
      ],
    });
  });

  it("is empty when the header never appears", () => {
    expect(parseAgentReport("oci-network-config: instance metadata not available")).toEqual({
      kind: "empty",
      block: "",
    });
  });

  it("is empty but keeps the block when no row qualifies", () => {
    const raw = report(["Operating System level network configuration:", TABLE_HEADER]);

    expect(parseAgentReport(raw)).toEqual({ kind: "empty", block: TABLE_HEADER });
  });

  it("ignores qualifying-looking lines outside the section", () => {
    const stray = "Header... ens3 - eno1 192.168.1.5 x y eno1";
    const raw = report(
      [stray],
      ["Operating System level network configuration:", TABLE_HEADER, ENS3_ROW],
      [stray, "a 192.168.1.5 c d e f g eno1"]
    );

    const parsed = parseAgentReport(raw);

    expect(parsed.kind).toBe("rows");
    if (parsed.kind === "rows") {
      expect(parsed.rows).toEqual([{ name: "ens3", expectedIp: "10.0.0.94" }]);
    }
  });

  it("keeps duplicate interface rows as separate rows", () => {
    const raw = report([
      "Operating System level network configuration:",
      ENS5_ROW,
      ENS5_PENDING_ROW,
    ]);

    const parsed = parseAgentReport(raw);

    expect(parsed.kind === "rows" && parsed.rows).toEqual([
      { name: "ens5", expectedIp: "10.0.1.17" },
      { name: "ens5", expectedIp: null },
    ]);
  });

  it("reads only the first section when the header appears twice", () => {
    const raw = report(
      ["Operating System level network configuration:", TABLE_HEADER, ENS3_ROW],
      ["Operating System level network configuration:", TABLE_HEADER, ENS5_ROW]
    );

    expect(parseAgentReport(raw)).toEqual({
      kind: "rows",
      block: [TABLE_HEADER, ENS3_ROW].join("\n"),
      rows: [{ name: "ens3", expectedIp: "10.0.0.94" }],
    });
  });
});
