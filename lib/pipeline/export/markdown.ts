import yaml from "js-yaml";
import type { RenderInput } from "./types";

/**
 * Markdown export: YAML front matter, the title as a level-1 heading,
 * then the appendix body unchanged.
 */
export function renderMarkdown(input: RenderInput): string {
  const { metadata } = input;
  const frontMatter = yaml.dump(
    {
      title: metadata.title,
      group: input.groupId,
      generated_at: metadata.timestamp,
      source: metadata.sourceLabel,
      generated_by: metadata.attribution,
      model: input.modelId,
    },
    { lineWidth: -1 }
  );
  return `---\n${frontMatter}---\n\n# ${metadata.title}\n\n${input.content.trim()}\n`;
}
