/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  findConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
} from "./config.js";
import type { DeclmapConfig } from "./types.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept a complete config", () => {
      const raw = {
        directory: "src",
        output: "src/autoload.cjs",
        extensions: ["ts", "tsx"],
        exclude: ["vendor/"],
        caseSensitive: true,
        followSymlinks: false,
        prepend: true,
        includeStatic: true,
        relative: false,
        namespace: "App",
        className: "Loader",
      };

      expect(parseConfig(raw)).to.deep.equal({ ok: true, value: raw });
    });

    it("should name the field with the wrong type", () => {
      const result = parseConfig({ caseSensitive: "yes" });

      expect(result.ok).to.be.false;
      if (result.ok) return;
      expect(result.error).to.match(/^declmap\.json: 'caseSensitive' /);
    });

    it("should reject unknown fields", () => {
      expect(parseConfig({ directroy: "src" }).ok).to.be.false;
    });

    it("should reject a non-object body", () => {
      expect(parseConfig(["src"]).ok).to.be.false;
    });
  });

  describe("files", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.realpathSync(
        fs.mkdtempSync(path.join(os.tmpdir(), "declmap-config-"))
      );
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should find declmap.json in a parent directory", () => {
      const configPath = path.join(tempDir, "declmap.json");
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });

    it("should load a valid file", () => {
      const configPath = path.join(tempDir, "declmap.json");
      fs.writeFileSync(configPath, '{ "directory": "lib" }');

      expect(loadConfig(configPath)).to.deep.equal({
        ok: true,
        value: { directory: "lib" },
      });
    });

    it("should report malformed JSON", () => {
      const configPath = path.join(tempDir, "declmap.json");
      fs.writeFileSync(configPath, "{ directory: ");

      const result = loadConfig(configPath);

      expect(result.ok).to.be.false;
      if (result.ok) return;
      expect(result.error).to.match(/^Failed to parse declmap\.json: /);
    });

    it("should report a missing file", () => {
      const configPath = path.join(tempDir, "missing.json");

      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${configPath}`,
      });
    });
  });

  describe("resolveConfig", () => {
    const config: DeclmapConfig = {
      directory: "src",
      output: "build/autoload.cjs",
      extensions: ["ts"],
      exclude: ["vendor/"],
      caseSensitive: true,
      relative: true,
      className: "FromFile",
    };

    it("should resolve file paths against the project root", () => {
      const result = resolveConfig(config, {}, "/work/project", undefined, "/elsewhere");

      expect(result.directory).to.equal("/work/project/src");
      expect(result.output).to.equal("/work/project/build/autoload.cjs");
      expect(result.options).to.deep.equal({
        extensions: ["ts"],
        exclude: ["vendor/"],
        caseSensitive: true,
        followSymlinks: undefined,
        prepend: undefined,
        includeStatic: undefined,
        relative: true,
        namespace: undefined,
        className: "FromFile",
      });
    });

    it("should let CLI options override the file", () => {
      const result = resolveConfig(
        config,
        {
          out: "out.cjs",
          extensions: ["cjs"],
          exclude: ["tmp/"],
          absolute: true,
          className: "FromFlag",
          verbose: true,
        },
        "/work/project",
        "lib",
        "/work/project/packages"
      );

      expect(result.directory).to.equal("/work/project/packages/lib");
      expect(result.output).to.equal("/work/project/packages/out.cjs");
      expect(result.options.extensions).to.deep.equal(["cjs"]);
      expect(result.options.exclude).to.deep.equal(["vendor/", "tmp/"]);
      expect(result.options.relative).to.be.false;
      expect(result.options.className).to.equal("FromFlag");
      expect(result.verbose).to.be.true;
      expect(result.quiet).to.be.false;
    });

    it("should leave the directory undefined when nothing names one", () => {
      const result = resolveConfig({}, {}, "/work");

      expect(result.directory).to.be.undefined;
      expect(result.output).to.be.undefined;
    });

    it("should keep absolute paths as given", () => {
      const result = resolveConfig({ directory: "/abs/src" }, {}, "/work");

      expect(result.directory).to.equal("/abs/src");
    });
  });
});
