import { TimeoutError } from "./errors";

export async function withTimeout<T>(work: () => Promise<T> | T, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  const task = (async () => await work())();
  try {
    return await Promise.race([task, expiry]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
