import "jest-extended";
import { textFormat } from "../lib/logging";

// the key winston writers read the formatted line from
const MESSAGE = Symbol.for("message");

test("log lines carry level, timestamp and component", () => {
  const info = textFormat.transform({
    level: "info",
    message: "Processing data file 2 of 3",
    component: "package",
  });

  expect(typeof info).toBe("object");

  if (typeof info === "object") {
    expect(info["timestamp"]).toBeString();
    expect(info[MESSAGE]).toBe(`INFO  ${info["timestamp"]} [package] Processing data file 2 of 3`);
    expect(info[MESSAGE]).toMatch(/^INFO  \d{4}-\d\d-\d\dT\d\d:\d\d:\d\d\.\d{3}Z \[package\] /);
  }
});

test("log lines without a component leave it out", () => {
  const info = textFormat.transform({ level: "warn", message: "Session expired" });

  expect(typeof info === "object" && info[MESSAGE]).toMatch(/^WARN  \S+ Session expired$/);
});
