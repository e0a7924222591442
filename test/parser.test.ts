import { expect } from "chai";
import {
  Container,
  ContainerError,
  count,
  createTestLogger,
  SqlParser,
  Symbols,
  Tables,
  UnprovisionedError,
} from "../src/index";
import { school, student } from "./fixtures";

// ---------------------------------------------------------------------------
// TEST FIXTURES
// ---------------------------------------------------------------------------

const score = student.get("score");
const surname = student.get("surname");

/** Records what every table scan was handed. */
class RecordingParser extends SqlParser {
  readonly scans: Array<{ origin: string; fields: readonly string[]; predicate?: string }> = [];

  protected generateTable(
    origin: string,
    fields: readonly string[],
    predicate: string | undefined
  ): string {
    this.scans.push({ origin, fields, predicate });
    return origin;
  }
}

describe("Container", () => {
  it("should start with a single root scope", () => {
    const container = new Container<string, string>();
    expect(container.depth).to.equal(1);
    expect(() => container.exit()).to.throw(ContainerError, "Unbalanced context exit");
  });

  it("should refuse to leave a scope with unconsumed symbols", () => {
    const container = new Container<string, string>();
    container.enter();
    container.context.symbols.push({ type: "source", value: "x" });
    expect(() => container.exit()).to.throw(ContainerError, "Context not fetched");
    expect(container.fetch()).to.deep.equal({ type: "source", value: "x" });
    container.exit();
    expect(container.depth).to.equal(1);
  });

  it("should refuse to fetch while more than one symbol remains", () => {
    const container = new Container<string, string>();
    container.context.symbols.push({ type: "feature", value: "a" });
    container.context.symbols.push({ type: "feature", value: "b" });
    expect(() => container.fetch()).to.throw(ContainerError, "Premature fetch");
  });

  it("should refuse to fetch from an empty scope", () => {
    const container = new Container<string, string>();
    expect(() => container.fetch()).to.throw(ContainerError, "Empty context");
  });

  it("should discard a scope whose body throws", () => {
    const container = new Container<string, string>();
    expect(() =>
      container.scope(() => {
        container.context.symbols.push({ type: "source", value: "leak" });
        throw new Error("boom");
      })
    ).to.throw("boom");
    expect(container.depth).to.equal(1);
    expect(container.context.symbols.dirty).to.equal(false);
  });
});

describe("Symbols", () => {
  it("should check the symbol type when popping", () => {
    const symbols = new Symbols<string, string>();
    symbols.push({ type: "feature", value: "f" });
    expect(() => symbols.popSource()).to.throw(ContainerError, "Expecting a source symbol");
    symbols.push({ type: "source", value: "s" });
    expect(() => symbols.popFeature()).to.throw(ContainerError, "Expecting a feature symbol");
  });
});

describe("Tables", () => {
  it("should register columns and factors per table", () => {
    const tables = new Tables();
    tables.select(surname.alias("n"), school.get("name"));
    tables.filter(score.lt(2).and(school.get("name").eq("Alpha")));

    const students = tables.segment(student);
    expect(students.columns.map((c) => c.name)).to.deep.equal(["score", "surname"]);
    expect(students.predicate?.toString()).to.equal("student.score < 2");

    const schools = tables.segment(school);
    expect(schools.columns.map((c) => c.name)).to.deep.equal(["name"]);
    expect(schools.predicate?.toString()).to.equal("school.name == 'Alpha'");
  });

  it("should leave tables without factors unfiltered", () => {
    const tables = new Tables();
    tables.select(surname);
    expect(tables.segment(student).predicate).to.equal(undefined);
  });
});

describe("Visitor", () => {
  describe("table bookkeeping", () => {
    it("should hand every scan its referenced fields and pushed-down predicate", () => {
      const parser = new RecordingParser();
      parser.compile(
        student
          .join(school, school.get("sid").eq(student.get("school")))
          .select(surname.alias("student"), count(school.get("name")).alias("num"))
          .groupby(surname)
          .where(score.lt(2))
          .orderby(student.get("level"), score, "desc")
      );
      expect(parser.scans).to.deep.equal([
        {
          origin: '"student"',
          fields: [
            '"student"."class"',
            '"student"."school"',
            '"student"."score"',
            '"student"."surname"',
          ],
          predicate: '"student"."score" < 2',
        },
        {
          origin: '"school"',
          fields: ['"school"."id"', '"school"."name"'],
          predicate: undefined,
        },
      ]);
    });

    it("should hand join condition factors to the table scans", () => {
      const parser = new RecordingParser();
      const on = school.get("sid").eq(student.get("school")).and(student.get("level").eq(1));
      parser.compile(student.join(school, on).select(surname));
      expect(parser.scans).to.deep.equal([
        {
          origin: '"student"',
          fields: ['"student"."class"', '"student"."school"', '"student"."surname"'],
          predicate: '"student"."class" = 1',
        },
        { origin: '"school"', fields: ['"school"."id"'], predicate: undefined },
      ]);
    });
  });

  describe("bypass", () => {
    it("should replace a provisioned source and log the override", () => {
      const view = student.select(surname);
      const logger = createTestLogger();
      const parser = new SqlParser({ sources: [[view, "students_view"]], logger });
      const ref = view.reference("s");
      expect(parser.compile(ref.select(ref.get("surname")))).to.equal(
        'SELECT "s"."surname" FROM students_view AS "s"'
      );
      expect(logger.getLogsByLevel("debug").map((entry) => entry.message)).to.deep.equal([
        "Overriding result for student[student.surname]",
        "Compiled source",
      ]);
    });

    it("should use provisioned element symbols", () => {
      const parser = new SqlParser({ features: [[score, "score_col"]] });
      expect(parser.compile(student.select(surname).where(score.lt(2)))).to.equal(
        'SELECT "student"."surname" FROM "student" WHERE score_col < 2'
      );
    });

    it("should replace a provisioned expression", () => {
      const bonus = score.add(1);
      const parser = new SqlParser({ features: [[bonus, "bonus"]] });
      expect(parser.compile(student.select(bonus.alias("b")))).to.equal(
        'SELECT bonus AS "b" FROM "student"'
      );
    });

    it("should keep the default translation when nothing is provisioned", () => {
      const logger = createTestLogger();
      const parser = new SqlParser({ logger });
      parser.compile(student.select(surname));
      expect(logger.getLogs().map((entry) => entry.message)).to.deep.equal(["Compiled source"]);
      expect(logger.getLogs()[0].context?.node).to.equal("student[student.surname]");
    });
  });

  describe("resolution", () => {
    it("should fail on features of an unknown origin", () => {
      const join = student.join(school, school.get("sid").eq(student.get("school")));
      const parser = new SqlParser();
      expect(() => parser.compileFeature(join.get("surname"))).to.throw(
        UnprovisionedError,
        "Unknown mapping for student INNER JOIN school"
      );
    });

    it("should leave the root scope clean between compilations", () => {
      const parser = new SqlParser();
      const query = student.select(surname);
      expect(parser.compile(query)).to.equal(parser.compile(query));
    });
  });
});
