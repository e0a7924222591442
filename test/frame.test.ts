import { expect } from "chai";
import { count, GrammarError, Join, sum, table, schema, Kinds } from "../src/index";
import { school, student } from "./fixtures";

// ---------------------------------------------------------------------------
// TEST FIXTURES
// ---------------------------------------------------------------------------

const score = student.get("score");
const level = student.get("level");
const surname = student.get("surname");
const condition = school.get("sid").eq(student.get("school"));

describe("Frame", () => {
  describe("Table", () => {
    it("should expose one column per field", () => {
      expect(student.features.map(String)).to.deep.equal([
        "student.surname",
        "student.birthday",
        "student.class",
        "student.score",
        "student.school",
        "student.updated",
      ]);
    });

    it("should be equal to any table with an equal schema", () => {
      const copy = table(schema("copy", { sid: Kinds.integer, name: Kinds.string }));
      expect(copy.equals(school)).to.equal(false);
      const same = table(schema("other", { id: Kinds.integer, name: Kinds.string }));
      expect(same.equals(school)).to.equal(true);
    });
  });

  describe("Reference", () => {
    it("should generate a random name when none is given", () => {
      expect(student.reference().name).to.match(/^[a-z]{8}$/);
    });

    it("should bind features to the reference", () => {
      const foo = student.reference("foo");
      expect(foo.get("level").toString()).to.equal("foo.class");
      expect(foo.get("level").equals(level)).to.equal(false);
      expect(foo.get("level").equals(student.reference("foo").get("level"))).to.equal(true);
    });

    it("should wrap the innermost instance", () => {
      const nested = student.reference("a").reference("b");
      expect(nested.instance.equals(student)).to.equal(true);
      expect(nested.schema.equals(student.schema)).to.equal(true);
    });

    it("should keep two references of one table apart", () => {
      const left = student.reference("a");
      const right = student.reference("b");
      expect(left.equals(right)).to.equal(false);
      expect(left.get("score").equals(right.get("score"))).to.equal(false);
    });
  });

  describe("Join", () => {
    it("should default to inner with a condition", () => {
      const join = student.join(school, condition);
      expect(join.kind).to.equal("inner");
      expect(join.toString()).to.equal("student INNER JOIN school ON school.id == student.school");
    });

    it("should default to cross without a condition", () => {
      expect(student.join(school).kind).to.equal("cross");
    });

    it("should reject mismatched kinds and conditions", () => {
      expect(() => new Join(student, school, condition, "cross")).to.throw(
        GrammarError,
        "Illegal use of condition and join type"
      );
      expect(() => new Join(student, school, undefined, "left")).to.throw(
        GrammarError,
        "Illegal use of condition and join type"
      );
    });

    it("should require the condition to use the joined features", () => {
      const other = student.reference("other");
      expect(() => student.join(school, other.get("school").eq(school.get("sid")))).to.throw(
        GrammarError,
        "not a subset of student and school features"
      );
    });

    it("should concatenate the schemas", () => {
      const join = student.leftJoin(school, condition);
      expect(join.schema.fields.map((f) => f.name)).to.deep.equal([
        "surname",
        "birthday",
        "class",
        "score",
        "school",
        "updated",
        "id",
        "name",
      ]);
    });
  });

  describe("Query", () => {
    it("should name anonymous features by position", () => {
      const query = student.select(score.add(1), surname.alias("n"), level);
      expect(query.schema.fields.map((f) => f.name)).to.deep.equal(["_0", "n", "class"]);
    });

    it("should render its clauses", () => {
      const query = student.select(surname).where(score.lt(2)).limit(5, 2);
      expect(query.toString()).to.equal("student[student.surname].where(student.score < 2)[2:5]");
    });

    it("should combine repeated filters with AND", () => {
      const query = student.where(score.lt(2)).where(level.eq(1));
      expect(query.prefilter?.toString()).to.equal("(student.score < 2) AND (student.class == 1)");
    });

    it("should leave the original statement untouched", () => {
      const base = student.select(surname);
      const filtered = base.where(score.lt(2));
      expect(base.prefilter).to.equal(undefined);
      expect(filtered.selection.length).to.equal(1);
    });

    it("should be structurally equal when built the same way", () => {
      const build = () => student.select(surname).where(score.lt(2)).orderby(level, "desc");
      expect(build().equals(build())).to.equal(true);
      expect(build().hash).to.equal(build().hash);
    });

    it("should reject features of another source", () => {
      expect(() => student.select(school.get("name"))).to.throw(
        GrammarError,
        "school.name not a subset of student features"
      );
    });

    it("should reject non-predicate filters", () => {
      expect(() => student.where(score)).to.throw(GrammarError, "student.score is not a predicate");
    });

    it("should reject aggregates in the prefilter", () => {
      expect(() => student.where(count(score).gt(1))).to.throw(
        GrammarError,
        "count(student.score) > 1 contains an aggregate or window"
      );
    });

    it("should reject windows in the postfilter", () => {
      const grouped = student.select(surname).groupby(surname);
      expect(() => grouped.having(sum(score).over().gt(1))).to.throw(
        GrammarError,
        "contains a window"
      );
    });

    it("should require selected features to be grouped or aggregated", () => {
      expect(() => student.select(surname, count()).groupby(level)).to.throw(
        GrammarError,
        "student.surname is neither grouped nor aggregated"
      );
      expect(() => student.select(surname, count(score)).groupby(surname)).to.not.throw();
    });

    it("should reject invalid row limits", () => {
      expect(() => student.limit(-1)).to.throw(GrammarError, "Invalid rows 0:-1");
    });
  });

  describe("SetOperation", () => {
    it("should require equal schemas", () => {
      const names = student.select(surname);
      expect(() => names.union(school.select(school.get("sid")))).to.throw(
        GrammarError,
        "Incompatible sources"
      );
    });

    it("should accept sources that repeat a field name", () => {
      const a = table(schema("a", { id: Kinds.integer, x: Kinds.integer }));
      const b = table(schema("b", { id: Kinds.integer }));
      const joined = a.join(b, a.get("id").eq(b.get("id")));
      expect(joined.schema.fields.map((f) => f.name)).to.deep.equal(["id", "x", "_2"]);
      const ids = joined.select(a.get("id"), b.get("id"));
      expect(ids.union(ids).features.map(String)).to.deep.equal(["a.id", "b.id"]);
      const ref = ids.reference("r");
      expect(ref.schema.fields.map((f) => f.name)).to.deep.equal(["id", "_1"]);
      expect(ref.get("_1").toString()).to.equal("r._1");
    });

    it("should take its features from the left side", () => {
      const left = student.select(surname).where(level.eq(1));
      const right = student.select(surname).where(level.eq(3));
      const union = left.union(right);
      expect(union.type).to.equal("Set");
      expect(union.features.map(String)).to.deep.equal(["student.surname"]);
    });
  });
});
