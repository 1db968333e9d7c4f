import path from "path";
import fs from "fs-extra";

const ROOT = path.resolve(__dirname, "../../..");

function readPackageFile(name: string, file: string) {
  return fs.readJsonSync(path.join(ROOT, "packages", name, file));
}

describe("workspace layout", () => {
  it.each(["core", "adapters-oci", "cli"])(
    "%s resolves to its compiled entry point at run time",
    (name) => {
      const dir = path.join(ROOT, "packages", name);
      const manifest = readPackageFile(name, "package.json");
      const { rootDir, outDir } = readPackageFile(name, "tsconfig.json").compilerOptions;

      const source = path.join(dir, manifest.types);
      const compiled = path
        .join(dir, outDir, path.relative(path.join(dir, rootDir), source))
        .replace(/\.ts$/, ".js");

      expect(fs.existsSync(source)).toBe(true);
      expect(path.join(dir, manifest.main)).toBe(compiled);
    }
  );

  it("points the binary at the compiled CLI entry point", () => {
    const manifest = fs.readJsonSync(path.join(ROOT, "package.json"));
    const { rootDir, outDir } = readPackageFile("cli", "tsconfig.json").compilerOptions;

    expect(manifest.bin["reserved-vnic"]).toBe(`packages/cli/${outDir}/index.js`);
    expect(fs.existsSync(path.join(ROOT, "packages/cli", rootDir, "index.ts"))).toBe(true);
  });

  it("builds each package after the packages it imports", () => {
    expect(readPackageFile("core", "tsconfig.json").references).toBeUndefined();
    expect(readPackageFile("adapters-oci", "tsconfig.json").references).toEqual([
      { path: "../core" },
    ]);
    expect(readPackageFile("cli", "tsconfig.json").references).toEqual([
      { path: "../core" },
      { path: "../adapters-oci" },
    ]);
  });
});
