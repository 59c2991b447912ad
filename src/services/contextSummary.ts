// Running digest of what earlier chapters established, threaded chapter to chapter
export function appendChapterSummary(running: string, chapterTitle: string, summary: string): string {
    const trimmed = summary.trim();
    if (!trimmed) return running;

    const entry = `${chapterTitle}: ${trimmed}`;
    return running ? `${running}\n\n${entry}` : entry;
}
