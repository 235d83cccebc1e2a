/**
 * Pull the first JSON object out of model output.
 * Accepts bare JSON, fenced ```json blocks, or an object embedded in prose.
 */
export function extractJsonLoose(text: string): unknown {
    if (!text) return null;
    const raw = text.trim();
    const fence = raw.match(/```(?:json)?\n([\s\S]*?)```/i);
    const candidate = fence?.[1]?.trim() ?? raw;

    const direct = tryParse(candidate);
    if (direct !== undefined) return direct;

    let depth = 0;
    let start = -1;
    let inStr = false;
    let esc = false;
    for (let i = 0; i < candidate.length; i++) {
        const ch = candidate[i];
        if (inStr) {
            if (esc) esc = false;
            else if (ch === '\\') esc = true;
            else if (ch === '"') inStr = false;
            continue;
        }
        if (ch === '"') { inStr = true; continue; }
        if (ch === '{') {
            if (depth === 0) start = i;
            depth++;
        } else if (ch === '}') {
            if (depth > 0) depth--;
            if (depth === 0 && start !== -1) {
                const parsed = tryParse(candidate.slice(start, i + 1));
                if (parsed !== undefined) return parsed;
                start = -1;
            }
        }
    }
    return null;
}

function tryParse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
