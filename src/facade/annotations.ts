export type AnnotationLevel = "info" | "warning" | "error";

export type Annotation = {
  readonly level: AnnotationLevel;
  readonly path: readonly string[];
  readonly message: string;
};

export class Annotations {
  private readonly entries: Annotation[] = [];

  addInfo(path: readonly string[], message: string): void {
    this.addMessage("info", path, message);
  }

  addWarning(path: readonly string[], message: string): void {
    this.addMessage("warning", path, message);
  }

  addError(path: readonly string[], message: string): void {
    this.addMessage("error", path, message);
  }

  get all(): readonly Annotation[] {
    return [...this.entries];
  }

  ofLevel(level: AnnotationLevel): readonly Annotation[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  private addMessage(level: AnnotationLevel, path: readonly string[], message: string): void {
    this.entries.push({ level, path: [...path], message });
  }
}

export const formatAnnotation = (annotation: Annotation): string =>
  `[${annotation.level}] ${annotation.path.join(".")}: ${annotation.message}`;
