/**
 * Tests for error handling - verify domain errors are converted to user-friendly messages.
 */

import { describe, expect, test } from "vitest"
import {
  AppError,
  fromDomainError,
  homeNotSet,
  hostsFileNotFound,
  hostsFileUnreadable,
  mountListingFailed,
  mountListingUnavailable,
  internal,
} from "./errors"

describe("AppError", () => {
  test("format() lays out title, detail and hint", () => {
    const error = new AppError("Test Error", "Something went wrong.", "Try doing X instead.")

    expect(error.format()).toBe(
      ["ERROR: Test Error", "", "   Something went wrong.", "", "   Hint: Try doing X instead."].join("\n")
    )
  })
})

describe("Domain error constructors", () => {
  test("homeNotSet points at --base-dir", () => {
    const error = homeNotSet()

    expect(error.title).toBe("HOME is not set")
    expect(error.suggestion).toContain("--base-dir")
  })

  test("hostsFileNotFound names the file", () => {
    const error = hostsFileNotFound("/home/test/remote/.hosts")

    expect(error.title).toBe("Hosts file not found")
    expect(error.detail).toBe(`The hosts file "/home/test/remote/.hosts" does not exist.`)
  })

  test("hostsFileUnreadable carries the reason", () => {
    const error = hostsFileUnreadable("/base/.hosts", "is a directory")

    expect(error.title).toBe("Cannot read hosts file")
    expect(error.detail).toBe(`Failed to read "/base/.hosts": is a directory`)
  })

  test("mountListingFailed says nothing was mounted", () => {
    const error = mountListingFailed("mount", 32)

    expect(error.title).toBe("Cannot list mounts")
    expect(error.detail).toBe("mount exited with status 32; nothing was mounted.")
  })

  test("mountListingUnavailable suggests installing the command", () => {
    const error = mountListingUnavailable("mount", "ENOENT")

    expect(error.detail).toBe("Could not run mount: ENOENT")
    expect(error.suggestion).toBe("Make sure 'mount' is installed and on your PATH.")
  })

  test("internal errors are flagged as bugs", () => {
    const error = internal("broken")

    expect(error.title).toBe("Internal error")
    expect(error.detail).toBe("broken")
    expect(error.suggestion).toContain("bug")
  })
})

describe("fromDomainError", () => {
  test("passes through AppError unchanged", () => {
    const original = new AppError("Original", "Detail", "Suggestion")

    expect(fromDomainError(original)).toBe(original)
  })

  test("converts standard Error to unexpected error", () => {
    const appError = fromDomainError(new Error("Something broke"))

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("Something broke")
  })

  test("converts permission Error to permission denied", () => {
    const appError = fromDomainError(new Error("EACCES: permission denied"))

    expect(appError.title).toBe("Permission denied")
    expect(appError.detail).toBe("EACCES: permission denied")
  })

  test("converts unknown value to unexpected error", () => {
    const appError = fromDomainError("just a string")

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("just a string")
  })

  test("unknown tags are unexpected errors", () => {
    const appError = fromDomainError({ _tag: "SomethingElse" })

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("[object Object]")
  })
})

// =============================================================================
// Typed service errors
// =============================================================================

describe("fromDomainError with configuration errors", () => {
  test("converts HomeNotSet", () => {
    expect(fromDomainError({ _tag: "HomeNotSet" }).title).toBe("HOME is not set")
  })

  test("converts HostsFileNotFound", () => {
    const appError = fromDomainError({ _tag: "HostsFileNotFound", path: "/base/.hosts" })

    expect(appError.title).toBe("Hosts file not found")
    expect(appError.detail).toContain("/base/.hosts")
  })

  test("converts HostsFilePermissionDenied", () => {
    const appError = fromDomainError({ _tag: "HostsFilePermissionDenied", path: "/base/.hosts" })

    expect(appError.title).toBe("Permission denied")
    expect(appError.detail).toBe(`Cannot read the hosts file "/base/.hosts": permission denied.`)
  })

  test("converts HostsFileUnreadable", () => {
    const appError = fromDomainError({
      _tag: "HostsFileUnreadable",
      path: "/base/.hosts",
      reason: "I/O error",
    })

    expect(appError.title).toBe("Cannot read hosts file")
    expect(appError.detail).toContain("I/O error")
  })
})

describe("fromDomainError with mount table errors", () => {
  test("converts MountListingFailed", () => {
    const appError = fromDomainError({
      _tag: "MountListingFailed",
      command: "mount",
      exitCode: 1,
      stderr: "mount: permission denied",
    })

    expect(appError.title).toBe("Cannot list mounts")
    expect(appError.detail).toBe("mount exited with status 1; nothing was mounted.")
  })

  test("converts MountListingUnavailable", () => {
    const appError = fromDomainError({
      _tag: "MountListingUnavailable",
      command: "mount",
      reason: "not found",
    })

    expect(appError.detail).toBe("Could not run mount: not found")
  })
})

describe("fromDomainError with invariant violations", () => {
  test("converts RowOutOfRange", () => {
    const appError = fromDomainError({ _tag: "RowOutOfRange", row: 5, size: 2 })

    expect(appError.title).toBe("Internal error")
    expect(appError.detail).toBe("A mount result arrived for row 5, but there are only 2 targets.")
  })

  test("converts IllegalTransition", () => {
    const appError = fromDomainError({
      _tag: "IllegalTransition",
      localName: "a",
      from: "Okay",
      to: "Failed",
    })

    expect(appError.title).toBe("Internal error")
    expect(appError.detail).toBe(`Target "a" cannot go from Okay to Failed.`)
  })

  test("converts UnresolvedTargets", () => {
    const appError = fromDomainError({ _tag: "UnresolvedTargets", localNames: ["a", "b"] })

    expect(appError.title).toBe("Internal error")
    expect(appError.detail).toBe("Targets left without a final status: a, b.")
  })
})
