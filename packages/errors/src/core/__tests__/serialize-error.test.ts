import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes an AppError with its cause chain", () => {
    const root = new TypeError("fetch failed")
    const err = new BaseError("Failed to send email", {
      code: "network_error",
      context: { endpoint: "https://mail.test/send" },
      cause: root,
      isRetryable: true,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "network_error",
      message: "Failed to send email",
      context: { endpoint: "https://mail.test/send" },
      isOperational: true,
      isRetryable: true,
      timestamp: "2024-01-15T10:30:00.000Z",
      cause: {
        name: "TypeError",
        code: "unknown",
        message: "fetch failed",
        context: {},
        isOperational: false,
        isRetryable: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      },
    })
  })

  it("omits stack unless requested", () => {
    const err = new BaseError("test", { code: "test" })

    expect("stack" in serializeError(err)).toBe(false)
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("wraps a thrown string", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
      context: {},
    })
  })

  it("keeps other thrown values in context", () => {
    expect(serializeError({ status: 500 })).toMatchObject({
      name: "NonErrorThrown",
      message: "Unknown error",
      context: { value: { status: 500 } },
    })
  })
})
