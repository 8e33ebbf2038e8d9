import { mkdtempSync } from "fs";
import { mkdir, readdir, readFile, rm, symlink, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { Dataset } from "../node/datasets/Dataset";
import { CsvCodec } from "../node/tables/CsvCodec";
import { FeatherCodec } from "../node/tables/FeatherCodec";
import { DatasetMeta } from "../core/meta/DatasetMeta";
import { Table } from "../core/tables/Table";
import { ConflictError, NotFoundError, ValidationError } from "../core/errors";
import { CatalogLogger } from "../core/logging/CatalogLogger";
import { LogLevel } from "../core/logging/LogLevel";
import type { Logger } from "../core/logging/Logger";

const quiet = { logger: new CatalogLogger(LogLevel.ERROR) };

class RecordingLogger implements Logger {
  constructor(
    readonly lines: string[] = [],
    private readonly context: string = ""
  ) {}

  error(message: string): void {
    this.lines.push(`error ${this.context} ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn ${this.context} ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info ${this.context} ${message}`);
  }
  debug(message: string): void {
    this.lines.push(`debug ${this.context} ${message}`);
  }
  trace(message: string): void {
    this.lines.push(`trace ${this.context} ${message}`);
  }
  isLevelEnabled(): boolean {
    return true;
  }
  createChild(context: string): Logger {
    return new RecordingLogger(this.lines, context);
  }
}

function createTestTable(name: string, populations: number[] = [67.8, 84.4]): Table {
  return new Table(
    [
      { name: "country", values: ["fr", "de"] },
      { name: "population", values: populations },
      { name: "eu_member", values: [true, true] },
    ],
    { shortName: name, title: `${name} table`, primaryKey: ["country"] }
  );
}

describe("Dataset", () => {
  let basePath: string;
  let datasetPath: string;

  beforeEach(() => {
    basePath = mkdtempSync(join(tmpdir(), "catalog-dataset-"));
    datasetPath = join(basePath, "pets");
  });

  afterEach(async () => {
    await rm(basePath, { recursive: true, force: true });
  });

  describe("open", () => {
    test("fails with NotFoundError when the index is missing", async () => {
      await mkdir(datasetPath);
      await expect(Dataset.open(datasetPath, quiet)).rejects.toBeInstanceOf(NotFoundError);
    });

    test("fails with NotFoundError when the directory does not exist", async () => {
      await expect(Dataset.open(join(basePath, "nope"), quiet)).rejects.toBeInstanceOf(NotFoundError);
    });

    test("rejects a malformed index with ValidationError", async () => {
      await mkdir(datasetPath);
      await writeFile(join(datasetPath, "index.json"), '{"is_public": "yes"}');
      await expect(Dataset.open(datasetPath, quiet)).rejects.toBeInstanceOf(ValidationError);
    });

    test("loads metadata eagerly", async () => {
      await mkdir(datasetPath);
      await writeFile(join(datasetPath, "index.json"), '{"title": "Pets", "version": "2024"}');
      const ds = await Dataset.open(datasetPath, quiet);
      expect(ds.metadata.title).toBe("Pets");
      expect(ds.metadata.version).toBe("2024");
      expect(ds.metadata.isPublic).toBe(true);
    });
  });

  describe("createEmpty", () => {
    test("creates the directory with a default index", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      expect(ds.path).toBe(datasetPath);
      expect(await readdir(datasetPath)).toEqual(["index.json"]);
      expect(ds.metadata.equals(new DatasetMeta())).toBe(true);
      expect(await ds.count()).toBe(0);
    });

    test("writes the supplied metadata", async () => {
      const meta = new DatasetMeta({ namespace: "animals", shortName: "pets", title: "Pets" });
      await Dataset.createEmpty(datasetPath, meta, quiet);
      const reopened = await Dataset.open(datasetPath, quiet);
      expect(reopened.metadata.equals(meta)).toBe(true);
    });

    test("creates missing parent directories", async () => {
      const nested = join(basePath, "a", "b", "pets");
      await Dataset.createEmpty(nested, undefined, quiet);
      expect(await readdir(nested)).toEqual(["index.json"]);
    });

    test("resets an existing dataset to empty", async () => {
      const ds = await Dataset.createEmpty(datasetPath, new DatasetMeta({ title: "Old" }), quiet);
      await ds.add(createTestTable("dogs"));
      await ds.add(createTestTable("cats"), "csv");
      await writeFile(join(datasetPath, "notes.txt"), "scratch");
      expect(await ds.count()).toBe(2);

      const fresh = await Dataset.createEmpty(datasetPath, undefined, quiet);
      expect(await fresh.count()).toBe(0);
      expect(await readdir(datasetPath)).toEqual(["index.json"]);
      expect(fresh.metadata.title).toBeUndefined();
    });

    test("refuses a directory without an index and deletes nothing", async () => {
      await mkdir(datasetPath);
      await writeFile(join(datasetPath, "precious.txt"), "keep me");
      await mkdir(join(datasetPath, "sub"));
      await writeFile(join(datasetPath, "sub", "also.csv"), "a\n1\n");

      await expect(Dataset.createEmpty(datasetPath, undefined, quiet)).rejects.toBeInstanceOf(ConflictError);

      expect((await readdir(datasetPath)).sort()).toEqual(["precious.txt", "sub"]);
      expect(await readFile(join(datasetPath, "precious.txt"), "utf8")).toBe("keep me");
      expect(await readdir(join(datasetPath, "sub"))).toEqual(["also.csv"]);
    });

    test("refuses a path that is a regular file", async () => {
      await writeFile(datasetPath, "not a directory");
      const err = await Dataset.createEmpty(datasetPath, undefined, quiet).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConflictError);
      expect(await readFile(datasetPath, "utf8")).toBe("not a directory");
    });
  });

  describe("save", () => {
    test("save then reopen yields an identical metadata document", async () => {
      await mkdir(datasetPath);
      await writeFile(
        join(datasetPath, "index.json"),
        JSON.stringify({
          namespace: "animals",
          title: "Pets",
          sources: [{ name: "Shelter survey", url: "https://example.org/survey" }],
          licenses: [{ name: "CC BY 4.0" }],
          is_public: false,
        })
      );
      const ds = await Dataset.open(datasetPath, quiet);
      const before = ds.metadata.clone();
      await ds.save();

      const reopened = await Dataset.open(datasetPath, quiet);
      expect(reopened.metadata.equals(before)).toBe(true);
      expect(reopened.metadata.sources).toEqual([
        {
          name: "Shelter survey",
          description: undefined,
          url: "https://example.org/survey",
          dateAccessed: undefined,
          publicationDate: undefined,
        },
      ]);
    });

    test("persists metadata changes", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      ds.metadata.title = "Renamed";
      await ds.save();
      expect((await Dataset.open(datasetPath, quiet)).metadata.title).toBe("Renamed");
    });
  });

  describe("logging", () => {
    test("traces operations through a Dataset child logger", async () => {
      const logger = new RecordingLogger();
      const ds = await Dataset.createEmpty(datasetPath, undefined, { logger });
      await ds.add(createTestTable("dogs"), "csv");

      expect(logger.lines).toEqual([
        `debug Dataset Opened dataset at ${datasetPath}`,
        "debug Dataset Added table dogs (csv, 2 rows)",
      ]);
    });
  });

  describe("metadata properties", () => {
    test("read and write through to the metadata document", async () => {
      const ds = await Dataset.createEmpty(datasetPath, new DatasetMeta({ title: "Pets" }), quiet);
      expect(ds.title).toBe("Pets");
      expect(ds.isPublic).toBe(true);

      ds.description = "Household animals";
      ds.isPublic = false;
      expect(ds.metadata.description).toBe("Household animals");
      expect(ds.metadata.isPublic).toBe(false);

      ds.metadata.version = "2";
      expect(ds.version).toBe("2");
    });

    test("follow a replaced metadata document", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      ds.metadata = new DatasetMeta({ shortName: "zoo" });
      expect(ds.shortName).toBe("zoo");
    });

    test("are not own enumerable properties of the instance", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      expect(Object.keys(ds)).not.toContain("title");
      expect(Object.prototype.hasOwnProperty.call(Dataset.prototype, "title")).toBe(true);
    });
  });

  describe("add / get / contains", () => {
    test.each(["feather", "csv"])("round-trips a table stored as %s", async (format) => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      const table = createTestTable("dogs");
      await ds.add(table, format);

      expect(await ds.contains("dogs")).toBe(true);
      const loaded = await ds.get("dogs");
      expect(loaded.equals(table)).toBe(true);
      expect(loaded.records()).toEqual([
        { country: "fr", population: 67.8, eu_member: true },
        { country: "de", population: 84.4, eu_member: true },
      ]);
    });

    test("defaults to feather and writes a sidecar", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("dogs"));
      expect((await readdir(datasetPath)).sort()).toEqual(["dogs.feather", "dogs.meta.json", "index.json"]);
    });

    test("rejects unsupported formats without writing", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await expect(ds.add(createTestTable("dogs"), "parquet")).rejects.toBeInstanceOf(ValidationError);
      expect(await readdir(datasetPath)).toEqual(["index.json"]);
    });

    test("rejects tables without a valid name", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      const unnamed = new Table([{ name: "a", values: [1] }]);
      const badName = new Table([{ name: "a", values: [1] }], { shortName: "../escape" });
      await expect(ds.add(unnamed)).rejects.toBeInstanceOf(ValidationError);
      await expect(ds.add(badName)).rejects.toBeInstanceOf(ValidationError);
    });

    test("get fails with NotFoundError for an absent table", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      const err = await ds.get("dogs").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toMatchObject({ target: "dogs" });
      expect(await ds.contains("dogs")).toBe(false);
    });

    test("names that are not table names are absent", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      expect(await ds.contains("index")).toBe(false);
      expect(await ds.contains("../pets/index")).toBe(false);
      await expect(ds.get("../pets/index")).rejects.toBeInstanceOf(NotFoundError);
    });

    test("re-adding in another format replaces the old data file", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("dogs"), "feather");
      await ds.add(createTestTable("dogs", [1, 2]), "csv");

      expect((await readdir(datasetPath)).sort()).toEqual(["dogs.csv", "dogs.meta.json", "index.json"]);
      expect((await ds.get("dogs")).column("population")?.values).toEqual([1, 2]);
      expect(await ds.count()).toBe(1);
    });

    test("feather shadows csv when both exist; removing feather exposes csv", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await new CsvCodec().write(createTestTable("dogs", [1, 2]), join(datasetPath, "dogs.csv"));
      await new FeatherCodec().write(createTestTable("dogs", [3, 4]), join(datasetPath, "dogs.feather"));

      expect(await ds.contains("dogs")).toBe(true);
      expect((await ds.get("dogs")).column("population")?.values).toEqual([3, 4]);

      await rm(join(datasetPath, "dogs.feather"));
      expect(await ds.contains("dogs")).toBe(true);
      expect((await ds.get("dogs")).column("population")?.values).toEqual([1, 2]);
    });
  });

  describe("enumeration", () => {
    test("lists data files of both formats sorted by file name", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("zebras"));
      await ds.add(createTestTable("ants"), "csv");
      await ds.add(createTestTable("moles"));

      expect(await ds.count()).toBe(3);
      expect(await ds.tableNames()).toEqual(["ants", "moles", "zebras"]);

      const names: (string | undefined)[] = [];
      for await (const table of ds) {
        names.push(table.name);
      }
      expect(names).toEqual(["ants", "moles", "zebras"]);
    });

    test("is restartable and reflects later additions", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("dogs"));

      const first: Table[] = [];
      for await (const table of ds.tables()) {
        first.push(table);
      }
      await ds.add(createTestTable("cats"));
      const second: Table[] = [];
      for await (const table of ds.tables()) {
        second.push(table);
      }

      expect(first.map((t) => t.name)).toEqual(["dogs"]);
      expect(second.map((t) => t.name)).toEqual(["cats", "dogs"]);
    });

    test("ignores the index, sidecars, other files and directories", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("dogs"));
      await writeFile(join(datasetPath, "README.md"), "hi");
      await mkdir(join(datasetPath, "nested.csv"));

      expect(await ds.count()).toBe(1);
      expect(await ds.tableNames()).toEqual(["dogs"]);
    });

    test("counts symlinked data files that contains() reports", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("real"));
      await symlink(join(datasetPath, "real.feather"), join(datasetPath, "linked.feather"));
      await writeFile(join(datasetPath, "linked.meta.json"), '{"short_name": "linked"}');
      await symlink(join(datasetPath, "gone.feather"), join(datasetPath, "dangling.feather"));

      expect(await ds.contains("linked")).toBe(true);
      expect(await ds.contains("dangling")).toBe(false);
      expect(await ds.count()).toBe(2);
      expect(await ds.tableNames()).toEqual(["linked", "real"]);

      const names: (string | undefined)[] = [];
      for await (const table of ds) {
        names.push(table.name);
      }
      expect(names).toEqual(["linked", "real"]);
    });

    test("decodes lazily, one table per step", async () => {
      const ds = await Dataset.createEmpty(datasetPath, undefined, quiet);
      await ds.add(createTestTable("aardvarks"));
      await ds.add(createTestTable("badgers"));

      const iterator = ds.tables();
      const first = await iterator.next();
      expect(first.done ? undefined : first.value.name).toBe("aardvarks");

      // The listing was taken before the first table was decoded.
      await rm(join(datasetPath, "badgers.feather"));
      await expect(iterator.next()).rejects.toMatchObject({ code: "ENOENT" });
    });
  });
});
