import rateLimit from "express-rate-limit";

const WINDOW_MS = 15 * 60 * 1000;

// General API rate limit: 100 requests per 15 minutes per IP
export const generalLimiter = rateLimit({
  windowMs: WINDOW_MS,
  max: 100,
  message: {
    success: false,
    message: "Too many requests. Please try again later.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

// Extraction parses and re-renders whole filings: 20 requests per 15 minutes per IP
export const extractLimiter = rateLimit({
  windowMs: WINDOW_MS,
  max: 20,
  message: {
    success: false,
    message: "Too many extraction requests. Please wait before trying again.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});
