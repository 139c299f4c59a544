import type { Config } from "../types.js";

export const defaultConfig: Config = {
  kinds: {
    extra_labels: new Map()
  },
  verify_signatures: true,
  render: {
    summary_max_length: 160
  },
  output: {
    format: "json"
  }
};
