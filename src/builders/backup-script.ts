import type { BackupSpec } from '../apis/v1alpha1/search-database.js';

export const BACKUP_MOUNT_PATH = '/backup';

export interface BackupScriptOptions {
  /** Dump file prefix, normally the descriptor name. */
  prefix: string;
  retention: BackupSpec['retentionPolicy'];
}

/**
 * Reads dump names on stdin, newest first, and prints the ones to delete.
 * Keeps the newest KEEP_LAST dumps, the newest dump of each of the
 * KEEP_DAILY most recent days and of each of the KEEP_WEEKLY most recent
 * ISO weeks.
 */
function pruneFunction({ prefix, retention }: BackupScriptOptions): string {
  return `KEEP_LAST=${retention.keepLast}
KEEP_DAILY=${retention.keepDaily}
KEEP_WEEKLY=${retention.keepWeekly}

prune_candidates() {
  n=0; nd=0; nw=0; kept_days=""; kept_weeks=""
  while read -r f; do
    [ -n "$f" ] || continue
    n=$((n + 1))
    stamp=\${f#${prefix}-}
    day=\${stamp%%T*}
    week=$(date -u -d "$day" +%G%V)
    keep=0
    if [ "$n" -le "$KEEP_LAST" ]; then keep=1; fi
    case " $kept_days " in
      *" $day "*) ;;
      *) if [ "$nd" -lt "$KEEP_DAILY" ]; then kept_days="$kept_days $day"; nd=$((nd + 1)); keep=1; fi ;;
    esac
    case " $kept_weeks " in
      *" $week "*) ;;
      *) if [ "$nw" -lt "$KEEP_WEEKLY" ]; then kept_weeks="$kept_weeks $week"; nw=$((nw + 1)); keep=1; fi ;;
    esac
    [ "$keep" -eq 1 ] || echo "$f"
  done
}`;
}

function dumpPattern(prefix: string): string {
  return `^${prefix.replace(/[.]/g, '\\.')}-[0-9]{8}T[0-9]{6}Z\\.dump$`;
}

/** Init container: writes one custom-format dump into the backup volume. */
export function buildDumpScript(prefix: string, host: string, database: string): string {
  return `set -eu
stamp=$(date -u +%Y%m%dT%H%M%SZ)
target="${BACKUP_MOUNT_PATH}/${prefix}-$stamp.dump"
pg_dump -h "${host}" -d "${database}" -Fc -f "$target.partial"
mv "$target.partial" "$target"
echo "wrote $target"
`;
}

/** Main container for S3 targets: upload the dump, then prune the bucket prefix. */
export function buildS3UploadScript(options: BackupScriptOptions & { destination: string }): string {
  const { prefix, destination } = options;
  return `set -eu
${pruneFunction(options)}

file=$(ls -1 ${BACKUP_MOUNT_PATH} | grep -E '${dumpPattern(prefix)}' | sort -r | head -n 1)
[ -n "$file" ] || { echo "no dump produced" >&2; exit 1; }
size=$(wc -c < "${BACKUP_MOUNT_PATH}/$file" | tr -d ' ')
aws s3 cp "${BACKUP_MOUNT_PATH}/$file" "${destination}$file" --endpoint-url "$S3_ENDPOINT"

aws s3 ls "${destination}" --endpoint-url "$S3_ENDPOINT" | awk '{print $4}' \\
  | grep -E '${dumpPattern(prefix)}' | sort -r | prune_candidates \\
  | while read -r old; do aws s3 rm "${destination}$old" --endpoint-url "$S3_ENDPOINT"; done

echo "size=$size" > /dev/termination-log
`;
}

/** Main container for volume targets: the dump is already in place, only prune. */
export function buildVolumePruneScript(options: BackupScriptOptions): string {
  const { prefix } = options;
  return `set -eu
${pruneFunction(options)}

file=$(ls -1 ${BACKUP_MOUNT_PATH} | grep -E '${dumpPattern(prefix)}' | sort -r | head -n 1)
[ -n "$file" ] || { echo "no dump produced" >&2; exit 1; }
size=$(wc -c < "${BACKUP_MOUNT_PATH}/$file" | tr -d ' ')

ls -1 ${BACKUP_MOUNT_PATH} | grep -E '${dumpPattern(prefix)}' | sort -r | prune_candidates \\
  | while read -r old; do rm -f "${BACKUP_MOUNT_PATH}/$old"; done

echo "size=$size" > /dev/termination-log
`;
}

/** Parses the `size=<bytes>` termination message written by the backup job. */
export function parseBackupSize(message: string | undefined): number | undefined {
  const match = message?.match(/size=(\d+)/);
  return match ? Number(match[1]) : undefined;
}

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}
