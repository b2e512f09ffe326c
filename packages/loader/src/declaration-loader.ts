/**
 * Declaration loader - live registration and artifact rendering
 *
 * One instance owns a mapping builder (and with it the scan cache) and the
 * records of every resolver it registered with its host.
 */

import {
  type DeclarationMap,
  type Diagnostic,
  type DiagnosticSink,
  type LoaderOptions,
  type Result,
  MappingBuilder,
  attempt,
  consoleSink,
  createDiagnostic,
  error,
  ok,
  resolveOptions,
} from "@declmap/frontend";
import { renderLoaderSource, renderTable } from "@declmap/emitter";
import { canonicalDirectory } from "./canonical-path.js";
import { ResolverChain } from "./resolver-chain.js";
import { requireModule } from "./module-loader.js";
import { ensureSupportedRuntime } from "./runtime-check.js";
import { createResolver } from "./resolver.js";
import type {
  ActiveLoader,
  LoaderRecord,
  ModuleLoader,
  ResolverHost,
} from "./types.js";

export type DeclarationLoaderOptions = {
  /** Resolver list to register with (the process-wide chain by default) */
  readonly host?: ResolverHost;
  readonly loadModule?: ModuleLoader;
  /** Receives warnings and failures (stderr by default) */
  readonly report?: DiagnosticSink;
  readonly builder?: MappingBuilder;
};

export type RenderOptions = LoaderOptions & {
  /** Timestamp written to the header (now by default) */
  readonly generatedAt?: Date;
  /** Where the rendered file will be written (the scanned root by default) */
  readonly artifactDirectory?: string;
};

export class DeclarationLoader {
  private readonly host: ResolverHost;
  private readonly loadModule: ModuleLoader;
  private readonly report: DiagnosticSink;
  private readonly builder: MappingBuilder;
  private readonly records: LoaderRecord[] = [];

  constructor(options: DeclarationLoaderOptions = {}) {
    this.host = options.host ?? new ResolverChain();
    this.loadModule = options.loadModule ?? requireModule;
    this.report = options.report ?? consoleSink;
    this.builder = options.builder ?? new MappingBuilder();
  }

  /**
   * Scan `directory` and register a resolver for everything it declares.
   * Returns false (after reporting why) when nothing was registered.
   */
  activate(directory: string, options: LoaderOptions = {}): boolean {
    const resolved = resolveOptions(options);
    const mapped = this.nonEmptyMap(directory, options);
    if (!mapped.ok) {
      return this.fail(mapped.error);
    }
    const map = mapped.value;

    const resolver = createResolver(map, {
      caseSensitive: resolved.caseSensitive,
      loadModule: this.loadModule,
      report: this.report,
    });
    const handle = this.host.register(resolver, resolved.prepend);
    if (handle === undefined) {
      return this.fail(
        createDiagnostic(
          "DCM3001",
          "error",
          `Resolver registration was rejected for ${map.directory}`
        )
      );
    }

    if (resolved.includeStatic) {
      for (const file of map.staticFiles) {
        const loaded = attempt(() => this.loadModule(file));
        if (!loaded.ok) {
          this.report(
            createDiagnostic(
              "DCM3002",
              "warning",
              `Loading static file failed: ${loaded.error}`,
              { file, line: 1, column: 1, length: 0 }
            )
          );
        }
      }
    }

    this.records.push({ directory: map.directory, handle, map });
    return true;
  }

  /**
   * Loader module source for `directory`
   */
  render(
    directory: string,
    options: RenderOptions = {}
  ): Result<string, Diagnostic> {
    const resolved = resolveOptions(options);
    const mapped = this.nonEmptyMap(directory, options);
    if (!mapped.ok) {
      this.report(mapped.error);
      return mapped;
    }

    const source = renderLoaderSource(mapped.value, {
      caseSensitive: resolved.caseSensitive,
      prepend: resolved.prepend,
      includeStatic: resolved.includeStatic,
      relative: resolved.relative,
      namespace: resolved.namespace,
      className: resolved.className,
      generatedAt: options.generatedAt ?? new Date(),
      artifactDirectory:
        options.artifactDirectory === undefined
          ? undefined
          : canonicalDirectory(options.artifactDirectory),
    });
    if (!source.ok) {
      this.report(source.error);
    }
    return source;
  }

  /**
   * Identifier to absolute path for `directory`
   */
  renderTable(
    directory: string,
    options: LoaderOptions = {}
  ): Result<Record<string, string>, Diagnostic> {
    const mapped = this.nonEmptyMap(directory, options);
    if (!mapped.ok) {
      this.report(mapped.error);
      return mapped;
    }
    return ok(renderTable(mapped.value));
  }

  /**
   * The scan result itself; an empty map is not a failure here
   */
  buildMap(
    directory: string,
    options: LoaderOptions = {}
  ): Result<DeclarationMap, Diagnostic> {
    ensureSupportedRuntime();
    return this.builder.build(directory, options, this.report);
  }

  /**
   * Ask the host's resolvers to load `identifier`
   */
  resolve(identifier: string): boolean {
    return this.host.resolve(identifier);
  }

  listActive(): readonly ActiveLoader[] {
    return this.records.map((record) => ({
      directory: record.directory,
      symbolCount: record.map.symbols.size,
    }));
  }

  clearCache(): void {
    this.builder.clearCache();
  }

  /**
   * Unregister every resolver this loader registered.
   * Returns how many the host actually removed.
   */
  unregisterAll(): number {
    let removed = 0;
    for (const record of this.records.splice(0)) {
      if (this.host.unregister(record.handle)) {
        removed++;
      }
    }
    return removed;
  }

  private nonEmptyMap(
    directory: string,
    options: LoaderOptions
  ): Result<DeclarationMap, Diagnostic> {
    const mapped = this.buildMap(directory, options);
    if (mapped.ok && mapped.value.symbols.size === 0) {
      return error(
        createDiagnostic(
          "DCM1003",
          "error",
          `No declarations found in ${mapped.value.directory}`
        )
      );
    }
    return mapped;
  }

  private fail(diagnostic: Diagnostic): false {
    this.report(diagnostic);
    return false;
  }
}
