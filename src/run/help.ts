import { Command, Option } from 'commander'

import { HASH_ALGORITHMS } from '../slides/hash.js'
import { REPRESENTATIVE_STRATEGIES } from '../slides/dedup.js'
import { supportsColor } from '../tty/progress.js'

export function ansi(code: string, text: string, enabled: boolean): string {
  return enabled ? `\u001b[${code}m${text}\u001b[0m` : text
}

export function buildProgram() {
  return new Command()
    .name('slidescribe')
    .description(
      'Extract the unique slides of a YouTube talk, OCR them, and write a Markdown report.'
    )
    .argument('[url]', 'YouTube video URL (watch, youtu.be, shorts, embed or live link)')
    .option('-o, --output <dir>', 'Base output directory for sessions (default: ./output).')
    .option(
      '--session <id>',
      'Session id to create or resume (default: youtube-<videoId>, so reruns resume).'
    )
    .option('--fresh', 'Discard any saved progress for this session and start over.', false)
    .option('--interval <seconds>', 'Seconds between sampled frames (0.1-60, default: 5).')
    .option(
      '--threshold <value>',
      'Similarity (0-1) at or above which frames count as the same slide (default: 0.85).'
    )
    .addOption(
      new Option('--strategy <name>', 'Which frame of a slide to keep (default: middle).').choices(
        REPRESENTATIVE_STRATEGIES
      )
    )
    .addOption(
      new Option('--hash <algorithm>', 'Frame fingerprint algorithm (default: perceptual).').choices(
        [...HASH_ALGORITHMS, 'ahash', 'dhash', 'phash']
      )
    )
    .option('--lang <codes>', 'OCR languages, e.g. eng or eng+deu (default: eng).')
    .option(
      '--ocr-confidence <value>',
      'Confidence (0-1) below which OCR text is flagged in the report (default: 0.6).'
    )
    .option('--memory-threshold <mb>', 'Memory limit in MB (min 100, default: 500).')
    .option('--max-duration <duration>', 'Longest video accepted, e.g. 90m, 4h (default: 4h).')
    .option(
      '--max-corrupt-frames <count>',
      'Unreadable frames to skip before giving up (default: 10).'
    )
    .option('--min-free-disk <mb>', 'Free disk space required before download (default: 500).')
    .option('--frame-format <format>', 'Frame image format: jpg or png (default: jpg).')
    .option('--workers <count>', 'Parallel hashing and OCR workers (1-16, default: 8).')
    .option('--retries <count>', 'Retries on network timeouts (0-10, default: 3).')
    .option('--timeout <duration>', 'Timeout per network call, e.g. 30s, 5m (default: 5m).')
    .option('--no-timeline', 'Leave the Mermaid timeline out of the report.')
    .option('--keep-artifacts', 'Keep the downloaded video and sampled frames.', false)
    .addOption(
      new Option('--log-level <level>', 'Log level: debug, info, warn, error.').choices([
        'debug',
        'info',
        'warn',
        'error',
      ])
    )
    .addOption(
      new Option('--log-format <format>', 'Log format: pretty or json.').choices(['pretty', 'json'])
    )
    .option('--no-progress', 'Do not print progress lines.')
    .option('--check-deps', 'Check that yt-dlp, ffmpeg, ffprobe and tesseract are installed.', false)
    .option('--verbose', 'Log stage details to stderr (same as --log-level info).', false)
    .option('-V, --version', 'Print version and exit', false)
    .allowExcessArguments(false)
}

export function attachRichHelp(
  program: Command,
  env: Record<string, string | undefined>,
  stdout: NodeJS.WritableStream
) {
  const color = supportsColor(stdout, env)
  const heading = (text: string) => ansi('1;36', text, color)
  const cmd = (text: string) => ansi('1', text, color)
  const dim = (text: string) => ansi('2', text, color)

  program.addHelpText(
    'after',
    () => `
${heading('Examples')}
  ${cmd('slidescribe "https://www.youtube.com/watch?v=VIDEO_ID"')}
  ${cmd('slidescribe "https://youtu.be/VIDEO_ID" --interval 2 --threshold 0.9')} ${dim('# denser sampling')}
  ${cmd('slidescribe "https://youtu.be/VIDEO_ID" --lang eng+deu')} ${dim('# OCR in two languages')}
  ${cmd('slidescribe "https://youtu.be/VIDEO_ID" --fresh')} ${dim('# ignore saved progress')}
  ${cmd('slidescribe --check-deps')}

${heading('Env Vars')}
  YT_DLP_PATH             optional path to yt-dlp
  FFMPEG_PATH             optional path to ffmpeg
  FFPROBE_PATH            optional path to ffprobe
  TESSERACT_PATH          optional path to tesseract
  SLIDESCRIBE_OUTPUT_DIR  optional default for --output
  SLIDESCRIBE_WORKERS     optional default for --workers (clamped to 1-16)
  SLIDESCRIBE_LOG_LEVEL   optional default for --log-level
  SLIDESCRIBE_CONFIG      optional config path (default: ~/.slidescribe/config.json)

${heading('Output')}
  <output>/<session>/report.md      the Markdown report
  <output>/<session>/slides/        one image per unique slide
  <output>/<session>/session.json   progress; rerun the same command to resume
`
  )
}
