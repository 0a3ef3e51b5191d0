import type { RequestDescriptor, StoredTemplate } from "@reqdeck/shared";

const json = (value: unknown): string => JSON.stringify(value ?? {});

export const formatDescriptorLines = (request: RequestDescriptor, indent = "  "): string[] => {
  const lines = [
    `${indent}Method: ${request.method}`,
    `${indent}URL: ${request.url}`,
    `${indent}Headers: ${json(request.headers)}`,
    `${indent}Data: ${request.body === undefined ? "none" : JSON.stringify(request.body)}`,
  ];
  if (request.auth) lines.push(`${indent}Auth: ${request.auth}`);
  return lines;
};

export const formatAliasLines = (name: string, request: RequestDescriptor): string[] => [
  `Alias: ${name}`,
  ...formatDescriptorLines(request),
];

export const formatTemplateLines = (template: StoredTemplate): string[] => {
  const lines = [`Template: ${template.name}`, ...formatDescriptorLines(template.request)];
  if (Object.keys(template.options).length > 0) {
    lines.push(`  Options: ${JSON.stringify(template.options)}`);
  }
  return lines;
};
