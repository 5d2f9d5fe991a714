import dotenv from "dotenv";
dotenv.config(); // .env 파일 로드

import { app } from "./app";
import { configFromEnv } from "./lib/generatorConfig";
import { initializeHistoryCache } from "./lib/historyCache";
import { scheduleHistoryReload } from "./scheduler/historyAutoReload";

const PORT = process.env.PORT || 4000;

async function bootstrap() {
  try {
    const now = new Date();
    console.log(">>> 서버 부트스트랩 시작", now.toLocaleString());

    // 1️⃣ 설정 검증
    const config = configFromEnv();
    console.log(
      `>>> Generator config: ${config.drawSize}/${config.minNumber}~${config.maxNumber}, maxAttempts=${config.maxAttempts}`
    );

    // 2️⃣ 당첨 이력 + profile 캐시 초기화
    await initializeHistoryCache(config);
    console.log(">>> History Cache 초기화 완료");

    // 3️⃣ 서버 시작
    const server = app.listen(PORT, () => {
      console.log(`>>> Server running on port ${PORT}`);
    });
    const task = scheduleHistoryReload();

    // 4️⃣ 종료 처리
    const shutdown = () => {
      console.log("Closing server...");
      task?.stop();
      server.close(() => process.exit(0));
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  } catch (err) {
    console.error("Server bootstrap failed:", err);
    process.exit(1);
  }
}

void bootstrap();
