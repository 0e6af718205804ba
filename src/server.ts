import "reflect-metadata";
import express from "express";
import cors from "cors";
import { createServer } from "http";
import { container } from "tsyringe";
import "./container";
import config from "./config/config";
import { FaqRetrievalService } from "./business/services/FaqRetrievalService";
import faqRoute from "./routes/FaqRoute";
import sentimentRoute from "./routes/SentimentRoute";
import chatRoute from "./routes/ChatRoute";
import reviewRoute from "./routes/ReviewRoute";

const app = express();

app.use(
  cors({
      origin: function (origin, callback) {
          if (!origin) return callback(null, true); // allow curl / postman etc.

          if (config.allowedOrigins.includes(origin)) {
              callback(null, true);
          } else {
              console.warn("❌ Blocked CORS origin:", origin);
              callback(new Error("Not allowed by CORS"));
          }
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
  })
);

app.use(express.json({ limit: "100kb" }));
app.use("/faq", faqRoute);
app.use("/sentiment", sentimentRoute);
app.use("/chat", chatRoute);
app.use("/reviews", reviewRoute);

//health check endpoint
app.get("/health", (req, res) => {
    res.status(200).send(`${config.port}`);
});

const server = createServer(app);

// A broken FAQ source is fatal at startup; no partial corpus is served.
container
    .resolve(FaqRetrievalService)
    .warmUp()
    .then((stats) => {
        server.listen(config.port, () =>
            console.log(`✅ Server running on port ${config.port} with ${stats.indexSize} FAQ entries`)
        );
    })
    .catch((error: unknown) => {
        console.error("❌ Failed to load the FAQ knowledge base", error);
        process.exit(1);
    });
