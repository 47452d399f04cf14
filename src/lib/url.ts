import path from "path";

export function isGitUrl(location: string): boolean {
  return (
    location.startsWith("https://") ||
    location.startsWith("http://") ||
    location.startsWith("ssh://") ||
    location.startsWith("git@") ||
    location.startsWith("git://") ||
    location.startsWith("file://") ||
    location.endsWith(".git")
  );
}

export function extractTemplateName(location: string): string {
  if (isGitUrl(location)) {
    const match = location.replace(/\/+$/, "").match(/[/:]([^/:]+?)(\.git)?$/);
    return match?.[1] ?? "template";
  }
  return path.basename(path.resolve(location)) || "template";
}
