import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  buildDumpScript,
  buildS3UploadScript,
  buildVolumePruneScript,
  formatBytes,
  parseBackupSize,
} from '../../src/builders/backup-script.js';

const retention = { keepLast: 3, keepDaily: 7, keepWeekly: 4 };

describe('backup scripts', () => {
  it('dumps to a partial file and renames it', () => {
    const script = buildDumpScript('demo', 'demo', 'paradedb');

    assert.ok(script.includes('target="/backup/demo-$stamp.dump"\n'));
    assert.ok(script.includes('pg_dump -h "demo" -d "paradedb" -Fc -f "$target.partial"\n'));
    assert.ok(script.includes('mv "$target.partial" "$target"\n'));
  });

  it('uploads and prunes under the destination prefix', () => {
    const script = buildS3UploadScript({ prefix: 'demo', retention, destination: 's3://bucket/nightly/' });

    assert.ok(script.includes('KEEP_LAST=3\nKEEP_DAILY=7\nKEEP_WEEKLY=4\n'));
    assert.ok(script.includes('stamp=${f#demo-}'));
    assert.ok(
      script.includes('aws s3 cp "/backup/$file" "s3://bucket/nightly/$file" --endpoint-url "$S3_ENDPOINT"\n'),
    );
    assert.ok(script.includes('aws s3 rm "s3://bucket/nightly/$old" --endpoint-url "$S3_ENDPOINT"'));
    assert.ok(script.endsWith('echo "size=$size" > /dev/termination-log\n'));
  });

  it('escapes dots in the dump name pattern', () => {
    const script = buildVolumePruneScript({ prefix: 'a.b', retention });

    assert.ok(script.includes(`grep -E '^a\\.b-[0-9]{8}T[0-9]{6}Z\\.dump$'`));
    assert.ok(script.includes('rm -f "/backup/$old"'));
    assert.equal(script.includes('aws '), false);
  });

  it('reads the size from the termination message', () => {
    assert.equal(parseBackupSize('size=1536'), 1536);
    assert.equal(parseBackupSize('wrote file\nsize=42\n'), 42);
    assert.equal(parseBackupSize('no size'), undefined);
    assert.equal(parseBackupSize(undefined), undefined);
  });

  it('formats byte counts in binary units', () => {
    assert.equal(formatBytes(0), '0 B');
    assert.equal(formatBytes(512), '512 B');
    assert.equal(formatBytes(1536), '1.5 KiB');
    assert.equal(formatBytes(1048576), '1.0 MiB');
    assert.equal(formatBytes(5 * 1024 ** 3), '5.0 GiB');
  });
});
