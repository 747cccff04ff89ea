import { HttpStatusCode } from "./enums";
import { Application, HTTPReq, Receive, Send } from "./types";

export type DemoAppOptions = {
  sheepCount?: number;
  sheepIntervalMs?: number;
};

type BufferGenerator = AsyncGenerator<Buffer, void, void>;

async function* countSheep(count: number, intervalMs: number): BufferGenerator {
  for (let i = 0; i < count; i++) {
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
    yield Buffer.from(`${i}\n`);
  }
}

async function sendText(send: Send, status: number, text: string): Promise<void> {
  const body = Buffer.from(text);
  await send({
    type: "start",
    status,
    headers: [
      ["content-type", "text/plain; charset=utf-8"],
      ["content-length", String(body.length)],
    ],
  });
  await send({ type: "body", data: body });
}

// the request body goes back out as it arrives, chunk for chunk
async function echo(receive: Receive, send: Send): Promise<void> {
  await send({
    type: "start",
    status: HttpStatusCode.OK,
    headers: [["content-type", "application/octet-stream"]],
  });

  for (;;) {
    const event = await receive();
    if (event.type === "disconnect") return;
    if (event.type === "end") break;
    await send({ type: "body", data: event.data, more: true });
  }
  await send({ type: "body" });
}

/** Small application used by `main.ts` and by the end-to-end tests. */
export function createDemoApp(options: DemoAppOptions = {}): Application {
  const sheepCount = options.sheepCount ?? 100;
  const sheepIntervalMs = options.sheepIntervalMs ?? 1000;

  return async (request: HTTPReq, receive: Receive, send: Send): Promise<void> => {
    switch (request.path) {
      case "/":
        await sendText(send, HttpStatusCode.OK, "hello world\n");
        return;
      case "/echo":
        await echo(receive, send);
        return;
      case "/sheep":
        await send({
          type: "start",
          status: HttpStatusCode.OK,
          headers: [["content-type", "text/plain; charset=utf-8"]],
        });
        for await (const line of countSheep(sheepCount, sheepIntervalMs)) {
          await send({ type: "body", data: line, more: true });
        }
        await send({ type: "body" });
        return;
      default:
        await sendText(send, HttpStatusCode.NOT_FOUND, "Not Found\n");
    }
  };
}

export const demoApp: Application = createDemoApp();
