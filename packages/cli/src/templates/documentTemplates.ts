export enum DocumentKind {
    TRANSCRIPT = 'transcript',
    SUMMARY = 'summary'
}

export const documentTemplates: Record<DocumentKind, string> = {
    [DocumentKind.TRANSCRIPT]: `# Meeting Transcript

## Source: {{SOURCE}}

_Generated on {{DATE}} | Processed by SpeechText.AI_
{{NOTE}}
---

{{BODY}}
`,
    [DocumentKind.SUMMARY]: `# Meeting Summary

## Meeting: {{SOURCE}}

_Generated on {{DATE}} | Summarized by Gemini_

---

{{BODY}}
`
};
