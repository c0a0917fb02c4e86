export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^\*\./, "").replace(/^\.+/, "").replace(/\.+$/, "")
}

/** `a.b.example.com` yields itself, `b.example.com`, `example.com` and `com`. */
export function domainSuffixes(host: string): string[] {
  const labels = normalizeDomain(host).split(".").filter((label) => label.length > 0)
  const suffixes: string[] = []

  for (let index = 0; index < labels.length; index += 1) {
    suffixes.push(labels.slice(index).join("."))
  }

  return suffixes
}
