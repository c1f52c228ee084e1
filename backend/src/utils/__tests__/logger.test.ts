import {
    createLogger,
    logErrorWithContext,
    resolveLogLevel,
    withLogTiming,
} from "../logger";

describe("logger", () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
    });

    afterEach(() => {
        process.env = originalEnv;
        jest.restoreAllMocks();
    });

    function spyConsole() {
        return {
            debug: jest.spyOn(console, "debug").mockImplementation(() => {}),
            info: jest.spyOn(console, "info").mockImplementation(() => {}),
            warn: jest.spyOn(console, "warn").mockImplementation(() => {}),
            error: jest.spyOn(console, "error").mockImplementation(() => {}),
        };
    }

    it("resolves the level from LOG_LEVEL and NODE_ENV", () => {
        expect(resolveLogLevel({ LOG_LEVEL: " WARN " })).toBe("warn");
        expect(resolveLogLevel({ LOG_LEVEL: "verbose" })).toBe("silent");
        expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("warn");
        expect(resolveLogLevel({ NODE_ENV: "test" })).toBe("silent");
        expect(resolveLogLevel({ NODE_ENV: "development" })).toBe("debug");
    });

    it("gates output below the configured level", () => {
        process.env.LOG_LEVEL = "warn";
        const consoleSpies = spyConsole();
        const log = createLogger("Policies");

        log.debug("hidden");
        log.info("hidden");
        log.warn("shown");
        log.error("shown too");

        expect(consoleSpies.debug).not.toHaveBeenCalled();
        expect(consoleSpies.info).not.toHaveBeenCalled();
        expect(consoleSpies.warn).toHaveBeenCalledWith("[WARN] [Policies] shown");
        expect(consoleSpies.error).toHaveBeenCalledWith(
            "[ERROR] [Policies] shown too",
        );
    });

    it("nests child scopes and serializes errors inside context", () => {
        process.env.LOG_LEVEL = "debug";
        const consoleSpies = spyConsole();
        const log = createLogger("Mixing").child(" Generator ");
        const failure = new Error("boom");

        log.info("step", { position: 2, error: failure });

        expect(consoleSpies.info).toHaveBeenCalledWith(
            "[INFO] [Mixing.Generator] step",
            {
                position: 2,
                error: {
                    name: "Error",
                    message: "boom",
                    stack: failure.stack,
                },
            },
        );
    });

    it("times synchronous work and rethrows failures", () => {
        process.env.LOG_LEVEL = "debug";
        const consoleSpies = spyConsole();
        const log = createLogger("Timing");

        expect(withLogTiming(log, "score", () => 42, { pair: "a:b" })).toBe(42);
        expect(consoleSpies.debug).toHaveBeenCalledWith(
            "[DEBUG] [Timing] score completed",
            expect.objectContaining({ pair: "a:b" }),
        );

        expect(() =>
            withLogTiming(log, "explode", () => {
                throw new Error("bad");
            }),
        ).toThrow("bad");
        expect(consoleSpies.error).toHaveBeenCalledWith(
            "[ERROR] [Timing] explode failed",
            expect.objectContaining({
                error: expect.objectContaining({ message: "bad" }),
            }),
        );
    });

    it("logs errors with merged context", () => {
        process.env.LOG_LEVEL = "error";
        const consoleSpies = spyConsole();

        logErrorWithContext(createLogger(), "import failed", "disk", {
            path: "/tmp/p.json",
        });

        expect(consoleSpies.error).toHaveBeenCalledWith("[ERROR] import failed", {
            path: "/tmp/p.json",
            error: "disk",
        });
    });
});
