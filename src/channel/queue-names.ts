/** `https://sqs.../123456789012/push-queue?x=1` → `push-queue` */
export function queueNameFromUrl(queueUrl: string): string {
  const base = queueUrl.split("?", 1)[0].replace(/\/+$/, "");
  const slash = base.lastIndexOf("/");
  return slash >= 0 ? base.slice(slash + 1) : base;
}

/** `arn:aws:sqs:region:account:queueName` → `queueName` */
export function queueNameFromArn(arn: string): string {
  const parts = arn.split(":");
  return parts[parts.length - 1] ?? "";
}
