/**
 * Tests for the declaration loader
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  type Diagnostic,
  MappingBuilder,
  collectInto,
} from "@declmap/frontend";
import { DeclarationLoader } from "./declaration-loader.js";
import type {
  RegistrationHandle,
  Resolver,
  ResolverHost,
} from "./types.js";

/**
 * In-memory host that records registrations
 */
class FakeHost implements ResolverHost {
  readonly registrations: { handle: RegistrationHandle; prepend: boolean }[] =
    [];
  accepting = true;

  register(resolver: Resolver, prepend: boolean): RegistrationHandle | undefined {
    if (!this.accepting) {
      return undefined;
    }
    const handle = { resolver };
    this.registrations.push({ handle, prepend });
    return handle;
  }

  unregister(handle: RegistrationHandle): boolean {
    const index = this.registrations.findIndex((r) => r.handle === handle);
    if (index === -1) {
      return false;
    }
    this.registrations.splice(index, 1);
    return true;
  }

  resolve(identifier: string): boolean {
    return this.registrations.some((r) => r.handle.resolver(identifier));
  }
}

describe("DeclarationLoader", () => {
  let root: string;
  let host: FakeHost;
  let builder: MappingBuilder;
  let loaded: string[];
  let diagnostics: Diagnostic[];
  let loader: DeclarationLoader;

  const write = (relative: string, content: string): string => {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    root = fs.realpathSync(
      fs.mkdtempSync(path.join(os.tmpdir(), "declmap-loader-"))
    );
    host = new FakeHost();
    builder = new MappingBuilder();
    loaded = [];
    diagnostics = [];
    loader = new DeclarationLoader({
      host,
      builder,
      loadModule: (file) => {
        loaded.push(file);
      },
      report: collectInto(diagnostics),
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe("activate", () => {
    it("should register a resolver for the scanned declarations", () => {
      const user = write("user.ts", "namespace App {\n  export class User {}\n}\n");

      expect(loader.activate(root)).to.be.true;
      expect(host.registrations.map((r) => r.prepend)).to.deep.equal([false]);
      expect(loader.listActive()).to.deep.equal([
        { directory: root, symbolCount: 1 },
      ]);

      expect(loader.resolve("App.User")).to.be.true;
      expect(loader.resolve("app.user")).to.be.true;
      expect(loader.resolve("App.Missing")).to.be.false;
      expect(loaded).to.deep.equal([user, user]);
      expect(diagnostics).to.deep.equal([]);
    });

    it("should honor case sensitivity and prepend", () => {
      write("user.ts", "class User {}\n");

      expect(loader.activate(root, { caseSensitive: true, prepend: true })).to
        .be.true;
      expect(host.registrations.map((r) => r.prepend)).to.deep.equal([true]);
      expect(loader.resolve("user")).to.be.false;
      expect(loader.resolve("User")).to.be.true;
    });

    it("should fail on a tree without declarations", () => {
      write("boot.ts", 'console.log("boot");\n');

      expect(loader.activate(root)).to.be.false;
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["DCM1003"]);
      expect(host.registrations).to.deep.equal([]);
      expect(loader.listActive()).to.deep.equal([]);
    });

    it("should fail on a missing directory", () => {
      expect(loader.activate(path.join(root, "missing"))).to.be.false;
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["DCM1001"]);
    });

    it("should keep no record when the host refuses", () => {
      write("user.ts", "class User {}\n");
      host.accepting = false;

      expect(loader.activate(root)).to.be.false;
      expect(diagnostics.map((d) => [d.code, d.severity])).to.deep.equal([
        ["DCM3001", "error"],
      ]);
      expect(loader.listActive()).to.deep.equal([]);
    });

    it("should load static files eagerly only when asked", () => {
      write("a.ts", "class A {}\n");
      const boot = write("boot.ts", 'console.log("boot");\n');

      loader.activate(root);
      expect(loaded).to.deep.equal([]);

      loader.activate(root, { includeStatic: true });
      expect(loaded).to.deep.equal([boot]);
    });

    it("should report a failing static file and stay active", () => {
      write("a.ts", "class A {}\n");
      write("boot.ts", 'throw new Error("boom");\n');
      const failing = new DeclarationLoader({
        host,
        builder,
        loadModule: () => {
          throw new Error("boom");
        },
        report: collectInto(diagnostics),
      });

      expect(failing.activate(root, { includeStatic: true })).to.be.true;
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["DCM3002"]);
    });
  });

  describe("management", () => {
    it("should list every activation in order", () => {
      write("one/a.ts", "class A {}\nclass B {}\n");
      write("two/c.ts", "class C {}\n");

      loader.activate(path.join(root, "one"));
      loader.activate(path.join(root, "two"));

      expect(loader.listActive()).to.deep.equal([
        { directory: path.join(root, "one"), symbolCount: 2 },
        { directory: path.join(root, "two"), symbolCount: 1 },
      ]);
    });

    it("should count only the resolvers the host removed", () => {
      write("a.ts", "class A {}\n");
      loader.activate(root);
      loader.activate(root, { prepend: true });
      host.registrations.splice(0, 1);

      expect(loader.unregisterAll()).to.equal(1);
      expect(host.registrations).to.deep.equal([]);
      expect(loader.listActive()).to.deep.equal([]);
      expect(loader.unregisterAll()).to.equal(0);
    });

    it("should clear the scan cache", () => {
      write("a.ts", "class A {}\n");
      loader.activate(root);
      expect(builder.cacheSize).to.equal(1);

      loader.clearCache();
      expect(builder.cacheSize).to.equal(0);
    });
  });

  describe("rendering", () => {
    it("should render an absolute data table", () => {
      const a = write("a.ts", "class A {}\n");

      const table = loader.renderTable(root, { relative: true });

      expect(table).to.deep.equal({ ok: true, value: { A: a } });
    });

    it("should render loader source", () => {
      write("a.ts", "class A {}\n");

      const result = loader.render(root, {
        generatedAt: new Date("2024-01-02T03:04:05.000Z"),
      });

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.split("\n")).to.include(
        ' * Generated at: 2024-01-02 03:04:05'
      );
      expect(result.value.split("\n")).to.include(
        '      "A": __dirname + "/a.ts",'
      );
    });

    it("should reference files from the artifact directory's real location", () => {
      write("src/a.ts", "class A {}\n");
      fs.mkdirSync(path.join(root, "deep", "real"), { recursive: true });
      fs.symlinkSync(path.join(root, "deep", "real"), path.join(root, "l"), "dir");

      const linked = loader.render(root, {
        artifactDirectory: path.join(root, "l"),
      });
      const notYetCreated = loader.render(root, {
        artifactDirectory: path.join(root, "l", "new", "dir"),
      });

      if (!linked.ok) throw new Error(linked.error.message);
      if (!notYetCreated.ok) throw new Error(notYetCreated.error.message);
      expect(linked.value.split("\n")).to.include(
        '      "A": __dirname + "/../../src/a.ts",'
      );
      expect(notYetCreated.value.split("\n")).to.include(
        '      "A": __dirname + "/../../../../src/a.ts",'
      );
    });

    it("should fail and report when nothing is declared", () => {
      const table = loader.renderTable(root);
      const source = loader.render(root);

      expect(table.ok).to.be.false;
      expect(source.ok).to.be.false;
      expect(diagnostics.map((d) => d.code)).to.deep.equal([
        "DCM1003",
        "DCM1003",
      ]);
    });

    it("should reject an invalid class name", () => {
      write("a.ts", "class A {}\n");

      const result = loader.render(root, { className: "new" });

      expect(result.ok).to.be.false;
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["DCM4001"]);
    });

    it("should expose empty scans without failing", () => {
      const result = loader.buildMap(root);

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.symbols.size).to.equal(0);
      expect(diagnostics).to.deep.equal([]);
    });
  });
});
