/**
 * Tests for map resolvers
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  type DeclarationMap,
  type Diagnostic,
  collectInto,
} from "@declmap/frontend";
import { createResolver, lookupFile } from "./resolver.js";

describe("Resolver", () => {
  let root: string;
  let loaded: string[];
  const recordLoad = (file: string): void => {
    loaded.push(file);
  };

  const mapOf = (entries: readonly (readonly [string, string])[]): DeclarationMap => ({
    directory: root,
    symbols: new Map(entries),
    staticFiles: [],
  });

  const touch = (name: string): string => {
    const file = path.join(root, name);
    fs.writeFileSync(file, "class X {}\n");
    return file;
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "declmap-resolver-"));
    loaded = [];
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe("lookupFile", () => {
    const symbols = new Map([
      ["App.User", "/a/user.ts"],
      ["app.user", "/a/lower.ts"],
      ["App.Role", "/a/role.ts"],
    ]);

    it("should take the first folded match over a later exact match", () => {
      expect(lookupFile(symbols, "app.user", false)).to.equal("/a/user.ts");
      expect(
        lookupFile(
          new Map([
            ["App.User", "/a/first.ts"],
            ["APP.USER", "/a/second.ts"],
          ]),
          "APP.USER",
          false
        )
      ).to.equal("/a/first.ts");
    });

    it("should take the first case-folded match in traversal order", () => {
      expect(lookupFile(symbols, "APP.USER", false)).to.equal("/a/user.ts");
    });

    it("should fold ASCII letters only", () => {
      const accented = new Map([["Ünit", "/a/unit.ts"]]);
      expect(lookupFile(accented, "üNIT", false)).to.be.undefined;
      expect(lookupFile(accented, "ÜNIT", false)).to.equal("/a/unit.ts");
    });

    it("should not fold case when case sensitive", () => {
      expect(lookupFile(symbols, "APP.USER", true)).to.be.undefined;
      expect(lookupFile(symbols, "App.Role", true)).to.equal("/a/role.ts");
    });
  });

  it("should load the mapped file", () => {
    const file = touch("user.ts");
    const resolver = createResolver(mapOf([["App.User", file]]), {
      caseSensitive: false,
      loadModule: recordLoad,
    });

    expect(resolver("app.USER")).to.be.true;
    expect(loaded).to.deep.equal([file]);
  });

  it("should decline unknown identifiers and vanished files", () => {
    const file = touch("gone.ts");
    const resolver = createResolver(mapOf([["Gone", file]]), {
      caseSensitive: true,
      loadModule: recordLoad,
    });
    fs.rmSync(file);

    expect(resolver("Missing")).to.be.false;
    expect(resolver("Gone")).to.be.false;
    expect(loaded).to.deep.equal([]);
  });

  it("should decline directories", () => {
    fs.mkdirSync(path.join(root, "dir.ts"));
    const resolver = createResolver(
      mapOf([["Dir", path.join(root, "dir.ts")]]),
      { caseSensitive: true, loadModule: recordLoad }
    );

    expect(resolver("Dir")).to.be.false;
  });

  it("should report a failing load instead of throwing", () => {
    const file = touch("broken.ts");
    const diagnostics: Diagnostic[] = [];
    const resolver = createResolver(mapOf([["Broken", file]]), {
      caseSensitive: true,
      loadModule: () => {
        throw new Error("SyntaxError: Unexpected token");
      },
      report: collectInto(diagnostics),
    });

    expect(resolver("Broken")).to.be.false;
    expect(
      diagnostics.map((d) => [d.code, d.severity, d.message])
    ).to.deep.equal([
      [
        "DCM3002",
        "warning",
        "Loading 'Broken' failed: SyntaxError: Unexpected token",
      ],
    ]);
  });
});
