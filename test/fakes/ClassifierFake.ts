import { setTimeout as sleep } from "node:timers/promises";

import type { Classifier } from "@/services/Classifier";
import type { ClassificationResult, PersonCategory } from "@/types";

export class ClassifierFake implements Classifier {
  private readonly results = new Map<string, ClassificationResult>();
  private readonly people = new Map<string, PersonCategory>();
  private readonly failures = new Map<string, Error>();
  readonly calls: string[] = [];

  /** @param delayMs 每次呼叫前等待的毫秒數 */
  constructor(private readonly delayMs = 0) {}

  async analyze(imagePath: string): Promise<ClassificationResult> {
    this.calls.push(`analyze:${imagePath}`);
    if (this.delayMs > 0) await sleep(this.delayMs);
    const failure = this.failures.get(imagePath);
    if (failure) throw failure;
    return this.results.get(imagePath) ?? {};
  }

  async countPeople(imagePath: string): Promise<PersonCategory> {
    this.calls.push(`countPeople:${imagePath}`);
    if (this.delayMs > 0) await sleep(this.delayMs);
    return this.people.get(imagePath) ?? "none";
  }

  setResult(
    imagePath: string,
    result: ClassificationResult,
    people: PersonCategory = "none"
  ) {
    this.results.set(imagePath, result);
    this.people.set(imagePath, people);
  }

  setFailure(imagePath: string, error: Error) {
    this.failures.set(imagePath, error);
  }
}
