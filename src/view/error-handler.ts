import type { ViewErrorHandler } from "./collaborators.js";
import type { ErrorOutput } from "../config/view/index.js";

/**
 * Renders a recoverable error inline instead of failing the whole view.
 */
export class TolerantErrorHandler implements ViewErrorHandler {
  constructor(private readonly output: ErrorOutput = "message") {}

  handleViewError(error: Error): string {
    switch (this.output) {
      case "message":
        return `View error: ${error.message}`;
      case "comment":
        // "--" would close the comment early
        return `<!-- View error: ${error.message.replace(/--/g, "- -")} -->`;
      case "silent":
        return "";
    }
  }
}
