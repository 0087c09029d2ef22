import "dotenv/config";
import { ChangeDetector } from "../lib/change-detector.js";
import { FetchHttpClient } from "../lib/http-client.js";
import { ReportCycle, type CycleResult } from "../lib/report-cycle.js";
import { DailyScheduler, formatRefreshTime } from "../lib/scheduler.js";
import { loadConfig } from "./config.js";
import { createStatusApp } from "./status-server.js";

async function main() {
  const config = loadConfig();

  // 조회/전송 모두 같은 HTTP 세션 설정 사용
  const http = new FetchHttpClient(config.httpTimeoutMs);
  const detector = new ChangeDetector();
  const cycle = new ReportCycle(http, detector, {
    sourceUrl: config.sourceUrl,
    webhookUrl: config.webhookUrl,
    channel: config.channel,
    watched: config.watched,
    locale: config.locale,
    maxAttempts: config.maxAttempts,
  });
  const scheduler = new DailyScheduler<CycleResult>(() => cycle.run(), config.refreshTime, {
    runOnStart: config.runOnStart,
  });

  if (config.port !== undefined) {
    const app = createStatusApp({
      lastMarker: () => detector.lastMarker,
      nextWakeAt: () => scheduler.nextWakeAt,
      lastCycle: () => scheduler.lastResult,
      preview: () => cycle.preview(),
    });
    // 상태 서버는 스케줄러가 종료되면 함께 내려간다 (process.exit)
    app.listen(config.port, () => {
      console.log(`[Status] Listening on http://localhost:${config.port}`);
    });
  }

  console.log(
    `[Main] Watching ${config.sourceUrl} for ${config.watched.map(w => w.country).join(", ")}, daily at ${formatRefreshTime(config.refreshTime)}`
  );
  await scheduler.run();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
