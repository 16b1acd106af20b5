import { describe, it, expect } from "vitest";
import { KeywordQueryAnalyzer } from "../analyzer.js";

const analyzer = new KeywordQueryAnalyzer();

describe("KeywordQueryAnalyzer", () => {
  it.each([
    "SELECT 1",
    "  (SELECT 1)",
    "select * from t",
    "VALUES (1), (2)",
    "EXPLAIN SELECT 1",
    "PRAGMA table_info(t)",
    "SHOW TABLES",
  ])("treats %j as returning rows", sql => {
    expect(analyzer.classify(sql)).toBe("returnsRows");
  });

  it.each(["INSERT INTO t VALUES (1)", "CREATE TABLE t (id INT)", "BEGIN", "-- only a comment", ""])(
    "treats %j as not returning rows",
    sql => {
      expect(analyzer.classify(sql)).toBe("other");
    },
  );

  it("treats RETURNING as row-producing", () => {
    expect(analyzer.classify("INSERT INTO t VALUES (1) RETURNING id")).toBe("returnsRows");
  });

  it("ignores RETURNING inside a literal", () => {
    expect(analyzer.classify("UPDATE t SET note = 'RETURNING'")).toBe("other");
  });

  it("decides a WITH query by its top-level statement", () => {
    expect(analyzer.classify("WITH x AS (SELECT 1) SELECT * FROM x")).toBe("returnsRows");
    expect(analyzer.classify("WITH x AS (SELECT 1) DELETE FROM t")).toBe("other");
    expect(analyzer.classify("WITH x AS (DELETE FROM t RETURNING *) SELECT * FROM x")).toBe("returnsRows");
  });

  it("classifies a batch by its last statement", () => {
    expect(analyzer.classify("INSERT INTO t VALUES (1); SELECT 1")).toBe("returnsRows");
    expect(analyzer.classify("SELECT 1; UPDATE t SET a = 1")).toBe("other");
  });
});
