import { once } from "node:events";

async function writeStdout(chunk: string): Promise<void> {
  if (!process.stdout.write(chunk)) {
    await once(process.stdout, "drain");
  }
}

export async function outputJson(value: unknown): Promise<void> {
  const serialized = JSON.stringify(value, null, 2);
  await writeStdout(`${serialized ?? "null"}\n`);
}

/** Write rendered text with a trailing newline. */
export async function outputText(text: string): Promise<void> {
  await writeStdout(text === "" ? "" : `${text}\n`);
}
