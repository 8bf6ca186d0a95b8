export type PolicyStatement = Readonly<{
  Effect: 'Allow';
  Action: ReadonlyArray<string>;
  Resource: string;
}>;

export type PolicyDocument = Readonly<{
  Version: '2012-10-17';
  Statement: ReadonlyArray<PolicyStatement>;
}>;

export const OBJECT_ACTIONS = ['s3:GetObject', 's3:PutObject', 's3:DeleteObject'] as const;
export const BUCKET_ACTIONS = ['s3:ListBucket'] as const;

/** Object read/write/delete inside the bucket plus listing the bucket itself; nothing else. */
export function renderBucketReadWritePolicy(bucket: string): PolicyDocument {
  if (bucket.trim() === '' || /[*?/]/.test(bucket)) {
    throw new Error(`Invalid bucket name for policy: "${bucket}"`);
  }

  return {
    Version: '2012-10-17',
    Statement: [
      { Effect: 'Allow', Action: [...OBJECT_ACTIONS], Resource: `arn:aws:s3:::${bucket}/*` },
      { Effect: 'Allow', Action: [...BUCKET_ACTIONS], Resource: `arn:aws:s3:::${bucket}` },
    ],
  };
}
