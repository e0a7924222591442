import { expect } from "chai";
import {
  avg,
  catalog,
  ClosureParser,
  Columnar,
  compareValues,
  count,
  max,
  min,
  sum,
  UnprovisionedError,
  UnsupportedError,
} from "../src/index";
import { school, schools, student, students } from "./fixtures";

// ---------------------------------------------------------------------------
// TEST FIXTURES
// ---------------------------------------------------------------------------

const data = catalog({ student: students, school: schools });
const score = student.get("score");
const level = student.get("level");
const surname = student.get("surname");
const condition = school.get("sid").eq(student.get("school"));

describe("ClosureParser", () => {
  describe("queries", () => {
    it("should evaluate a grouped join", () => {
      const query = student
        .join(school, condition)
        .select(surname.alias("student"), count(school.get("name")).alias("num"))
        .groupby(surname)
        .having(count(school.get("name")).gt(1))
        .where(score.lt(2))
        .orderby(level, score, "desc")
        .limit(10);
      const result = new ClosureParser().compile(query)(data);
      expect(result.records()).to.deep.equal([{ student: "Smith", num: 2 }]);
    });

    it("should order and slice rows", () => {
      const query = student.select(surname, score).orderby(level, score, "desc");
      const run = new ClosureParser().compile(query);
      expect(run(data).rows()).to.deep.equal([
        ["Jones", 3.0],
        ["Smith", 1.5],
        ["Green", 1.75],
        ["Brown", 0.5],
        ["Smith", 1.0],
      ]);
      const sliced = new ClosureParser().compile(query.limit(2, 1));
      expect(sliced(data).rows()).to.deep.equal([
        ["Smith", 1.5],
        ["Green", 1.75],
      ]);
    });

    it("should aggregate all rows without grouping keys", () => {
      const query = student.select(
        count().alias("n"),
        sum(level).alias("total"),
        min(score).alias("low"),
        max(score).alias("high"),
        avg(level).alias("mean")
      );
      expect(new ClosureParser().compile(query)(data).records()).to.deep.equal([
        { n: 5, total: 9, low: 0.5, high: 3, mean: 1.8 },
      ]);
    });

    it("should order groups by their aggregates", () => {
      const query = student
        .select(student.get("school"), count().alias("n"))
        .groupby(student.get("school"))
        .orderby(count(), "desc", student.get("school"));
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([
        [1, 2],
        [2, 2],
        [3, 1],
      ]);
    });

    it("should name anonymous columns by position", () => {
      const query = student.select(level.mul(10)).where(surname.eq("Green"));
      const result = new ClosureParser().compile(query)(data);
      expect(result.names).to.deep.equal(["_0"]);
      expect(result.rows()).to.deep.equal([[20]]);
    });
  });

  describe("joins", () => {
    it("should pad unmatched rows of a left join with nulls", () => {
      const query = school
        .leftJoin(student, student.get("school").eq(school.get("sid")))
        .select(school.get("name"), surname);
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([
        ["Alpha", "Smith"],
        ["Alpha", "Brown"],
        ["Beta", "Jones"],
        ["Beta", "Smith"],
        ["Gamma", "Green"],
        ["Delta", null],
      ]);
    });

    it("should filter on the nullable side after the join", () => {
      const query = school
        .leftJoin(student, student.get("school").eq(school.get("sid")))
        .select(school.get("name"))
        .where(surname.isNull());
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([["Delta"]]);
    });

    it("should pad unmatched rows of a right join with nulls", () => {
      const query = student
        .rightJoin(school, condition)
        .select(school.get("name"))
        .where(surname.isNull());
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([["Delta"]]);
    });

    it("should multiply rows in a cross join", () => {
      const query = student.crossJoin(school).select(count().alias("n"));
      expect(new ClosureParser().compile(query)(data).records()).to.deep.equal([{ n: 20 }]);
    });

    it("should keep two references of one table apart", () => {
      const a = student.reference("a");
      const b = student.reference("b");
      const query = a
        .join(
          b,
          a.get("school").eq(b.get("school")).and(a.get("surname").ne(b.get("surname")))
        )
        .select(a.get("surname").alias("left"), b.get("surname").alias("right"));
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([
        ["Smith", "Brown"],
        ["Brown", "Smith"],
        ["Jones", "Smith"],
        ["Smith", "Jones"],
      ]);
    });
  });

  describe("references", () => {
    it("should read subquery output through the reference", () => {
      const top = student.select(surname.alias("who"), score).where(score.gt(1.2)).reference("top");
      const query = top.select(top.get("who")).orderby(top.get("score"), "desc");
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([
        ["Jones"],
        ["Green"],
        ["Smith"],
      ]);
    });
  });

  describe("sets", () => {
    const first = student.select(surname).where(level.eq(1));
    const third = student.select(surname).where(level.eq(3));

    it("should keep distinct rows of a union", () => {
      const run = new ClosureParser().compile(first.union(third));
      expect(run(data).rows()).to.deep.equal([["Smith"], ["Jones"]]);
    });

    it("should intersect and subtract", () => {
      expect(new ClosureParser().compile(first.intersection(third))(data).rows()).to.deep.equal([
        ["Smith"],
      ]);
      expect(new ClosureParser().compile(first.difference(third))(data).rows()).to.deep.equal([
        ["Jones"],
      ]);
    });
  });

  describe("expressions", () => {
    it("should evaluate arithmetic", () => {
      const query = student.select(score.mul(2).alias("double"), level.div(2).alias("half"));
      const result = new ClosureParser().compile(query)(data);
      expect(result.column("double")).to.deep.equal([3, 1, 6, 2, 3.5]);
      expect(result.column("half")).to.deep.equal([0, 1, 0, 1, 1]);
    });

    it("should yield null on division by zero", () => {
      const query = student.select(level.div(0).alias("x")).limit(1);
      expect(new ClosureParser().compile(query)(data).records()).to.deep.equal([{ x: null }]);
    });

    it("should apply three-valued logic", () => {
      const query = school
        .leftJoin(student, condition)
        .select(
          school.get("name"),
          score.gt(1).or(true).alias("any"),
          score.gt(1).and(true).alias("all")
        )
        .where(school.get("sid").eq(4));
      expect(new ClosureParser().compile(query)(data).rows()).to.deep.equal([
        ["Delta", true, null],
      ]);
    });
  });

  describe("windows", () => {
    it("should run up to the last peer by default", () => {
      const running = sum(score).over([student.get("school")], [level]).alias("running");
      const result = new ClosureParser().compile(student.select(surname, running))(data);
      expect(result.column("running")).to.deep.equal([1.5, 2.0, 3.0, 4.0, 1.75]);
    });

    it("should honour explicit row frames", () => {
      const moving = sum(score)
        .over([], [level], { mode: "rows", start: -1, end: "current" })
        .alias("moving");
      const result = new ClosureParser().compile(student.select(surname, moving))(data);
      expect(result.column("moving")).to.deep.equal([1.5, 3.5, 4.5, 2.75, 2.25]);
    });

    it("should span the whole partition without ordering", () => {
      const total = count().over([student.get("school")]).alias("peers");
      const result = new ClosureParser().compile(student.select(total))(data);
      expect(result.column("peers")).to.deep.equal([2, 2, 2, 2, 1]);
    });

    it("should reject range frames", () => {
      const window = sum(score).over([], [level], { mode: "range", start: -1, end: 0 });
      expect(() => new ClosureParser().compile(student.select(window))).to.throw(
        UnsupportedError,
        "Unsupported window frame mode: range"
      );
    });
  });

  describe("sources", () => {
    it("should accept explicit data for a table", () => {
      const few = Columnar.fromRecord({ surname: ["Kim"], score: [9.5] });
      const parser = new ClosureParser({ sources: [[student, few]] });
      const result = parser.compile(student.select(surname, score))(new Map());
      expect(result.rows()).to.deep.equal([["Kim", 9.5]]);
    });

    it("should fail on tables missing from the catalog", () => {
      const run = new ClosureParser().compile(student.select(surname));
      expect(() => run(new Map())).to.throw(UnprovisionedError, "Unknown table student");
    });
  });

  describe("compareValues", () => {
    it("should order nulls first", () => {
      expect(compareValues(null, 1)).to.be.lessThan(0);
      expect(compareValues(1, null)).to.be.greaterThan(0);
      expect(compareValues(null, null)).to.equal(0);
      expect(compareValues("a", "b")).to.be.lessThan(0);
    });
  });
});
