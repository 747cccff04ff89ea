import { describe, expect, it } from "vitest";
import { createDemoApp } from "../src/app";
import { openConnection, textResponse } from "./helpers/setup";

async function exchange(request: string): Promise<string> {
  const { socket, handler } = openConnection(createDemoApp({ sheepCount: 2, sheepIntervalMs: 1 }));
  socket.feed(request);
  socket.endInput();
  await handler.whenClosed();
  return socket.output;
}

describe("demo app", () => {
  it("says hello", async () => {
    expect(await exchange("GET / HTTP/1.1\r\n\r\n")).toBe(textResponse("200 OK", "hello world\n"));
  });

  it("echoes the request body as a chunked stream", async () => {
    expect(await exchange("POST /echo HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello")).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "server: portico\r\n" +
        "content-type: application/octet-stream\r\n" +
        "transfer-encoding: chunked\r\n" +
        "\r\n" +
        "5\r\nhello\r\n" +
        "0\r\n\r\n"
    );
  });

  it("counts sheep line by line", async () => {
    expect(await exchange("GET /sheep HTTP/1.1\r\n\r\n")).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "server: portico\r\n" +
        "content-type: text/plain; charset=utf-8\r\n" +
        "transfer-encoding: chunked\r\n" +
        "\r\n" +
        "2\r\n0\n\r\n" +
        "2\r\n1\n\r\n" +
        "0\r\n\r\n"
    );
  });

  it("answers 404 elsewhere", async () => {
    expect(await exchange("GET /missing HTTP/1.1\r\n\r\n")).toBe(
      textResponse("404 Not Found", "Not Found\n")
    );
  });
});
