import dotenv from "dotenv";
dotenv.config();
import express, { Request, Response, NextFunction } from "express";
import cors from "cors";

// 라우터 import
import generateRouter from "./routes/generate";
import profileRouter from "./routes/profile";

export const app = express();

const allowedOrigins = ["http://localhost:3000"];
if (process.env.FRONTEND_URL) allowedOrigins.push(process.env.FRONTEND_URL);

// CORS 설정
app.use(
  cors({
    origin: allowedOrigins,
  })
);

app.use(express.json({ limit: "2mb" }));

// 라우터 등록
app.use("/api/generate", generateRouter);
app.use("/api/profile", profileRouter);

// 기본 라우트
app.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Lotto Pattern Generator API Server (TypeScript + dotenv)",
  });
});

// 에러 핸들링
app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
  console.error(err.stack);
  res.status(500).json({ success: false, error: "Server Error" });
});
