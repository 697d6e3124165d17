import { spinner } from "@clack/prompts";
import { printOk, printWarn } from "./cli";
import type { Annotation } from "./trigger/console-annotations";
import type { Reporter } from "./trigger/types";

export type ConsoleReporter = Reporter & {
  /** Stops the spinner, if one is running. */
  close(message?: string): void;
};

/**
 * Terminal reporter. On a TTY, progress goes to a single spinner line that
 * is paused whenever a regular line is printed.
 */
export function createConsoleReporter(options: {
  interactive: boolean;
}): ConsoleReporter {
  let statusSpinner: ReturnType<typeof spinner> | null = null;
  let lastProgress = "";

  const pause = (message?: string): void => {
    if (statusSpinner) {
      statusSpinner.stop(message ?? lastProgress);
      statusSpinner = null;
    }
  };

  return {
    progress(message) {
      lastProgress = message;
      if (!options.interactive) {
        printOk(message);
        return;
      }
      if (!statusSpinner) {
        statusSpinner = spinner();
        statusSpinner.start(message);
        return;
      }
      statusSpinner.message(message);
    },
    info(message) {
      pause();
      printOk(message);
    },
    warn(message) {
      pause();
      printWarn(message);
    },
    annotation(annotation) {
      pause();
      console.log(formatAnnotation(annotation));
    },
    close(message) {
      pause(message);
    },
  };
}

export const silentReporter: Reporter = {
  progress() {},
  info() {},
  warn() {},
  annotation() {},
};

export function formatAnnotation(annotation: Annotation): string {
  switch (annotation.kind) {
    case "stage-start":
      return `>> Stage started: ${annotation.text}`;
    case "stage-end":
      return `>> Stage finished: ${annotation.text}`;
    case "stage":
      return `>> Stage: ${annotation.text}`;
    case "build-success":
    case "build-info":
      return `>> ${annotation.text}`;
    case "problem":
      return `!! ${annotation.text}`;
    default:
      return `   ${annotation.text}`;
  }
}
