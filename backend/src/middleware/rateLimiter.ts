import rateLimit from "express-rate-limit";

// Scoring is synchronous; one limiter covers every mixing route
export const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: 600,
    message: "Too many requests from this IP, please try again later.",
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false,
    skip: (req) => req.path === "/health" || req.path === "/api/health",
});
