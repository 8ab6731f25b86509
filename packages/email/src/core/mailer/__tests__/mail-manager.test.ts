import type { Logger } from "@mailport/logger"
import { mock } from "vitest-mock-extended"
import { MemoryTransport } from "../../../adapters/memory/memory-transport"
import { MailManager } from "../mail-manager"
import type { MailConfig, TransportFactory } from "../mailer-config"
import { MailerError } from "../mailer-error"

const config: MailConfig = {
  default: "primary",
  mailers: {
    primary: { transport: "memory" },
    secondary: { transport: "memory", label: "second" },
    pigeon: { transport: "carrier-pigeon" },
  },
}

function memoryFactory() {
  return vi.fn<TransportFactory>(() => new MemoryTransport())
}

describe("MailManager", () => {
  it("resolves the default mailer", () => {
    const manager = new MailManager(config).extend("memory", memoryFactory())

    expect(manager.mailer().name).toBe("primary")
  })

  it("passes the mailer's config and name to the factory", () => {
    const factory = memoryFactory()
    const manager = new MailManager(config).extend("memory", factory)

    manager.mailer("secondary")

    expect(factory).toHaveBeenCalledWith(
      { transport: "memory", label: "second" },
      { mailer: "secondary", logger: expect.anything() },
    )
  })

  it("binds the mailer and transport to the logger", () => {
    const logger = mock<Logger>()
    const child = mock<Logger>()
    logger.child.mockReturnValue(child)
    const factory = memoryFactory()
    const manager = new MailManager(config, { logger }).extend("memory", factory)

    manager.mailer()

    expect(logger.child).toHaveBeenCalledWith({ mailer: "primary", transport: "memory" })
    expect(factory.mock.calls[0]?.[1].logger).toBe(child)
  })

  it("builds each mailer once", () => {
    const factory = memoryFactory()
    const manager = new MailManager(config).extend("memory", factory)

    expect(manager.mailer("primary")).toBe(manager.mailer())
    expect(factory).toHaveBeenCalledTimes(1)
  })

  it("rebuilds mailers after purge", () => {
    const factory = memoryFactory()
    const manager = new MailManager(config).extend("memory", factory)
    const first = manager.mailer()
    manager.mailer("secondary")

    manager.purge("primary")
    expect(manager.mailer()).not.toBe(first)
    expect(factory).toHaveBeenCalledTimes(3)

    manager.purge()
    manager.mailer("secondary")
    expect(factory).toHaveBeenCalledTimes(4)
  })

  it("does not cache a mailer that failed to build", () => {
    const factory = vi.fn<TransportFactory>()
    factory.mockImplementationOnce(() => {
      throw new Error("not yet")
    })
    factory.mockImplementation(() => new MemoryTransport())
    const manager = new MailManager(config).extend("memory", factory)

    expect(() => manager.mailer()).toThrow("not yet")
    expect(manager.mailer().name).toBe("primary")
  })

  it("throws for an unknown mailer", () => {
    const manager = new MailManager(config)

    expect(() => manager.mailer("missing")).toThrow(MailerError)
    expect(() => manager.mailer("missing")).toThrow("Mailer [missing] is not defined.")
  })

  it("throws for a transport without a factory", () => {
    const manager = new MailManager(config)

    expect(() => manager.mailer("pigeon")).toThrow("Unsupported mail transport [carrier-pigeon].")
  })

  it("replaces a factory registered under the same name", () => {
    const first = memoryFactory()
    const second = memoryFactory()
    const manager = new MailManager(config).extend("memory", first).extend("memory", second)

    manager.mailer()

    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
  })
})
