/**
 * Tests for loader source generation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { DeclarationMap } from "@declmap/frontend";
import {
  type LoaderSourceOptions,
  isValidClassName,
  loaderMarker,
  renderLoaderSource,
} from "./loader-source.js";
import { renderTable } from "./table.js";

const map: DeclarationMap = {
  directory: "/srv/app",
  symbols: new Map([
    ["App.User", "/srv/app/models/user.js"],
    ["Helper", "/srv/app/helper.js"],
  ]),
  staticFiles: ["/srv/app/boot.js"],
};

const baseOptions: LoaderSourceOptions = {
  caseSensitive: false,
  prepend: false,
  includeStatic: false,
  relative: true,
  namespace: "App",
  className: "Autoloader",
  generatedAt: new Date("2024-03-05T07:08:09.000Z"),
};

const render = (overrides: Partial<LoaderSourceOptions> = {}): string[] => {
  const result = renderLoaderSource(map, { ...baseOptions, ...overrides });
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value.split("\n");
};

describe("Loader source", () => {
  it("should describe the generation settings in the header", () => {
    const lines = render();

    expect(lines.slice(0, 12)).to.deep.equal([
      "/**",
      " * Declaration loader",
      " * Generated at: 2024-03-05 07:08:09",
      " * Total symbols: 2",
      " * Case insensitive: yes",
      " * Prepend: no",
      " * Relative paths: yes",
      " *",
      " * WARNING: Do not modify this file manually",
      " * @generated",
      " */",
      "",
    ]);
  });

  it("should render paths relative to the artifact directory", () => {
    const lines = render();

    expect(lines).to.include('      "App.User": __dirname + "/models/user.js",');
    expect(lines).to.include('      "Helper": __dirname + "/helper.js",');
  });

  it("should render paths relative to a separate output directory", () => {
    const lines = render({ artifactDirectory: "/srv/app/dist" });

    expect(lines).to.include('      "Helper": __dirname + "/../helper.js",');
  });

  it("should render absolute paths when asked", () => {
    const lines = render({ relative: false });

    expect(lines).to.include('      "App.User": "/srv/app/models/user.js",');
    expect(lines).to.include(" * Relative paths: no");
  });

  it("should only list static files when they are included", () => {
    expect(render()).to.not.include('      __dirname + "/boot.js",');
    expect(render({ includeStatic: true })).to.include(
      '      __dirname + "/boot.js",'
    );
  });

  it("should encode case handling and registration order", () => {
    const sensitive = render({ caseSensitive: true, prepend: true });

    expect(sensitive).to.include("    static caseInsensitive = false;");
    expect(sensitive).to.include("  resolvers.unshift(resolver);");
    expect(render()).to.include("  resolvers.push(resolver);");
  });

  it("should guard on a marker derived from the mapping and timestamp", () => {
    const marker = loaderMarker(renderTable(map), baseOptions);

    expect(marker).to.match(/^declmap\.App\.Autoloader\.[0-9a-f]{16}$/);
    expect(render()).to.include(
      `const MARKER = Symbol.for(${JSON.stringify(marker)});`
    );
    expect(
      loaderMarker(renderTable(map), {
        ...baseOptions,
        generatedAt: new Date("2024-03-05T07:08:10.000Z"),
      })
    ).to.not.equal(marker);
  });

  it("should leave the namespace out of the marker when empty", () => {
    expect(
      loaderMarker(renderTable(map), { ...baseOptions, namespace: "" })
    ).to.match(/^declmap\.Autoloader\.[0-9a-f]{16}$/);
  });

  it("should use the class name throughout", () => {
    const lines = render({ className: "ModelLoader" });

    expect(lines).to.include("  class ModelLoader {");
    expect(lines).to.include("  globalThis[MARKER] = ModelLoader;");
  });

  it("should reject class names that are not identifiers", () => {
    const result = renderLoaderSource(map, { ...baseOptions, className: "9lives" });

    expect(result.ok).to.be.false;
    if (result.ok) return;
    expect(result.error.code).to.equal("DCM4001");
  });

  describe("isValidClassName", () => {
    it("should accept identifiers and contextual keywords", () => {
      expect(isValidClassName("Autoloader")).to.be.true;
      expect(isValidClassName("$Loader_2")).to.be.true;
      expect(isValidClassName("type")).to.be.true;
    });

    it("should reject reserved words and non-identifiers", () => {
      expect(isValidClassName("class")).to.be.false;
      expect(isValidClassName("interface")).to.be.false;
      expect(isValidClassName("my-loader")).to.be.false;
      expect(isValidClassName("")).to.be.false;
    });
  });
});
