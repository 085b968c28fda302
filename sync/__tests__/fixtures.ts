function escapeXml(s: string) {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function message(
  source: string,
  translation: string,
  translationAttrs = "",
): string {
  return `    <message>
        <location filename="../main.cpp" line="12"/>
        <source>${escapeXml(source)}</source>
        <translation${translationAttrs}>${escapeXml(translation)}</translation>
    </message>`;
}

export function numerusMessage(source: string, forms: string[]): string {
  const numerusforms = forms
    .map((f) => `            <numerusform>${escapeXml(f)}</numerusform>`)
    .join("\n");
  return `    <message numerus="yes">
        <location filename="../main.cpp" line="40"/>
        <source>${escapeXml(source)}</source>
        <translation>
${numerusforms}
        </translation>
    </message>`;
}

export function validMessages(count: number): string[] {
  return Array.from({ length: count }, (_, i) =>
    message(`Item ${i + 1}`, `Eintrag ${i + 1}`),
  );
}

export function tsDocument(messages: string[], language = "de"): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE TS>
<TS version="2.1" language="${language}">
<context>
    <name>MainWindow</name>
${messages.join("\n")}
</context>
</TS>
`;
}

// Made-up address-shaped strings
export const LEGACY_ADDRESS = "1TestOnlyNotARealAddressXXXXXXXXXXX";
export const SEGWIT_ADDRESS = "bc1qtestonlytestonlytestonlytestonlyabcd";
