import { describe, expect, test } from "vitest"
import { canonicalizeDomain, hostMatchesRule } from "../src/lib/domain"
import { groupByDomain, toDomainGroups } from "../src/services/deduplicator"
import { record } from "./helpers"

describe("domain canonicalization", () => {
  test("lower-cases and strips trailing dots", () => {
    expect(canonicalizeDomain(" Example.COM. ")).toBe("example.com")
    expect(canonicalizeDomain("_dmarc.example.org")).toBe("_dmarc.example.org")
  })

  test("rejects empty and malformed names", () => {
    expect(canonicalizeDomain("")).toBeNull()
    expect(canonicalizeDomain("...")).toBeNull()
    expect(canonicalizeDomain("bad..example.com")).toBeNull()
    expect(canonicalizeDomain("-leading.example.com")).toBeNull()
    expect(canonicalizeDomain("spa ce.example.com")).toBeNull()
    expect(canonicalizeDomain(`${"a".repeat(64)}.com`)).toBeNull()
  })

  test("matches root and subdomains", () => {
    expect(hostMatchesRule("example.com", "example.com")).toBe(true)
    expect(hostMatchesRule("docs.example.com", "example.com")).toBe(true)
    expect(hostMatchesRule("example.net", "example.com")).toBe(false)
    expect(hostMatchesRule("badexample.com", "example.com")).toBe(false)
  })
})

describe("domain deduplicator", () => {
  test("groups N records into K domains in first-seen order", () => {
    const records = [
      record(1, "10.0.0.1", "b.example"),
      record(2, "10.0.0.2", "a.example"),
      record(3, "10.0.0.1", "b.example"),
      record(4, "10.0.0.3", "c.example"),
      record(5, "10.0.0.2", "a.example"),
    ]

    const result = groupByDomain(records)

    expect([...result.groups.keys()]).toEqual(["b.example", "a.example", "c.example"])
    expect(result.groups.get("b.example")?.map((item) => item.timestamp)).toEqual([1, 3])
    expect(result.groups.get("a.example")?.map((item) => item.timestamp)).toEqual([2, 5])
    expect(result.groups.get("c.example")?.map((item) => item.timestamp)).toEqual([4])
    expect(result.dropped).toEqual([])
  })

  test("uses the canonical domain as the only key", () => {
    const result = groupByDomain([
      record(1, "10.0.0.1", "Example.com."),
      record(2, "10.0.0.9", "example.com"),
    ])

    expect(result.groups.size).toBe(1)
    const group = result.groups.get("example.com")
    expect(group?.length).toBe(2)
    expect(group?.[0]?.domain).toBe("example.com")
    expect(group?.[0]?.clientIdentifier).toBe("10.0.0.1")
  })

  test("drops malformed records without failing the batch", () => {
    const malformed = record(2, "10.0.0.1", "not a domain")
    const result = groupByDomain([
      record(1, "10.0.0.1", "ok.example"),
      malformed,
      record(3, "10.0.0.1", ""),
    ])

    expect([...result.groups.keys()]).toEqual(["ok.example"])
    expect(result.dropped.length).toBe(2)
    expect(result.dropped[0]).toBe(malformed)
  })

  test("skips ignored domains and their subdomains", () => {
    const result = groupByDomain(
      [
        record(1, "10.0.0.1", "lan"),
        record(2, "10.0.0.1", "printer.lan"),
        record(3, "10.0.0.1", "tracker.example"),
      ],
      { ignoreDomains: ["lan"] },
    )

    expect([...result.groups.keys()]).toEqual(["tracker.example"])
    expect(result.ignored.map((item) => item.timestamp)).toEqual([1, 2])
  })

  test("converts groups into classification requests", () => {
    const { groups } = groupByDomain([record(1, "10.0.0.1", "a.example"), record(2, "10.0.0.1", "a.example")])

    const requests = toDomainGroups(groups)

    expect(requests.length).toBe(1)
    expect(requests[0]?.domain).toBe("a.example")
    expect(requests[0]?.records.length).toBe(2)
  })
})
