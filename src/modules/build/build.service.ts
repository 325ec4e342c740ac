import path from 'node:path'
import type { Logger } from 'pino'
import type { OutputPatternKey, ResumeBlock } from '@shared/types'
import type { ResumeConfig } from '../../config/resume-config'
import { logger as rootLogger } from '../../logger'
import { SourceNotFoundError } from '../../errors'
import { formatTimestamp } from '../../utils/timestamp'
import { readTextIfExists, writeFileEnsuringDir } from '../../utils/fs.util'
import { parseResumeMarkdown } from '../document/markdown.parser'
import { sanitizeFilenamePart } from '../document/text.util'
import { convertMarkdownToDox } from './dox.converter'
import { DocxService } from './docx.service'
import { PdfMakeService } from './pdfmake.service'
import { runDoxygen } from './doxygen-runner'

export type BuildStep = 'dox' | 'html' | 'docx' | 'pdf'

export interface BuildStepResult {
  step: BuildStep
  path: string
}

export interface BuildBaselineOptions {
  skipHtml?: boolean
  onStep?: (result: BuildStepResult) => void
}

export interface OptimizedBuildResult {
  dox: string
  docx: string
  pdf: string
}

export interface BuildServiceDeps {
  docx?: DocxService
  pdf?: PdfMakeService
  doxygen?: typeof runDoxygen
  now?: () => Date
  log?: Logger
}

/** HTML output Doxygen writes for the bundled Doxyfile */
export const DOXYGEN_INDEX = path.join('doxygen', 'html', 'index.html')

export class BuildService {
  private readonly docx: DocxService
  private readonly pdf: PdfMakeService
  private readonly doxygen: typeof runDoxygen
  private readonly now: () => Date
  private readonly log: Logger

  constructor(
    private readonly config: ResumeConfig,
    deps: BuildServiceDeps = {}
  ) {
    this.log = deps.log ?? rootLogger
    this.docx = deps.docx ?? new DocxService(this.log)
    this.pdf = deps.pdf ?? new PdfMakeService(this.log)
    this.doxygen = deps.doxygen ?? runDoxygen
    this.now = deps.now ?? (() => new Date())
  }

  async writeDox(sourcePath: string, outputPath: string): Promise<string> {
    const markdown = await this.readSource(sourcePath)
    await writeFileEnsuringDir(outputPath, convertMarkdownToDox(markdown))
    this.log.info({ source: sourcePath, output: outputPath }, 'Wrote DOX')
    return outputPath
  }

  async writeDocx(sourcePath: string, outputPath: string): Promise<string> {
    const blocks = await this.readBlocks(sourcePath)
    const buffer = await this.docx.renderResume(blocks, { title: this.config.name })
    await writeFileEnsuringDir(outputPath, buffer)
    this.log.info({ source: sourcePath, output: outputPath, size: buffer.length }, 'Wrote DOCX')
    return outputPath
  }

  async writePdf(sourcePath: string, outputPath: string): Promise<string> {
    const blocks = await this.readBlocks(sourcePath)
    const buffer = await this.pdf.renderResume(blocks, { title: this.config.name })
    await writeFileEnsuringDir(outputPath, buffer)
    this.log.info({ source: sourcePath, output: outputPath, size: buffer.length }, 'Wrote PDF')
    return outputPath
  }

  /** Run Doxygen on the configured Doxyfile from the project root */
  async buildHtml(): Promise<string> {
    const doxyfile = this.config.path('doxyfile')
    await this.doxygen(doxyfile, { cwd: this.config.rootDir })
    return path.join(this.config.path('build_dir'), DOXYGEN_INDEX)
  }

  baselineDocxPath(): string {
    return path.join(this.config.path('build_dir'), this.config.outputFilename('baseline_docx'))
  }

  baselinePdfPath(): string {
    return path.join(this.config.path('build_dir'), this.config.outputFilename('baseline_pdf'))
  }

  /**
   * DOX, HTML, DOCX and PDF from the baseline source, in that order.
   * The first failing step rejects and later steps do not run.
   */
  async buildBaseline(options: BuildBaselineOptions = {}): Promise<BuildStepResult[]> {
    const source = this.config.path('resume_source')
    const results: BuildStepResult[] = []
    const record = (result: BuildStepResult) => {
      results.push(result)
      options.onStep?.(result)
    }

    record({ step: 'dox', path: await this.writeDox(source, this.config.path('resume_dox')) })
    if (!options.skipHtml) {
      record({ step: 'html', path: await this.buildHtml() })
    }
    record({ step: 'docx', path: await this.writeDocx(source, this.baselineDocxPath()) })
    record({ step: 'pdf', path: await this.writePdf(source, this.baselinePdfPath()) })
    return results
  }

  /**
   * Render an optimized markdown file to DOX, DOCX and PDF in the build
   * directory. Filenames carry the company when one is given.
   */
  async buildOptimized(sourcePath: string, options: { company?: string } = {}): Promise<OptimizedBuildResult> {
    await this.readSource(sourcePath)

    const timestamp = formatTimestamp(this.now())
    const company = options.company ? sanitizeFilenamePart(options.company) : ''
    const buildDir = this.config.path('build_dir')
    const outputPath = (withCompany: OutputPatternKey, fallback: OutputPatternKey) =>
      path.join(
        buildDir,
        company
          ? this.config.outputFilename(withCompany, { timestamp, company })
          : this.config.outputFilename(fallback, { timestamp })
      )

    const dox = await this.writeDox(sourcePath, outputPath('optimized_dox', 'optimized_dox_fallback'))
    const docx = await this.writeDocx(sourcePath, outputPath('optimized_docx', 'optimized_docx_fallback'))
    const pdf = await this.writePdf(sourcePath, outputPath('optimized_pdf', 'optimized_pdf_fallback'))
    return { dox, docx, pdf }
  }

  private async readSource(sourcePath: string): Promise<string> {
    const markdown = await readTextIfExists(sourcePath)
    if (markdown === null) {
      throw new SourceNotFoundError('Resume source', sourcePath)
    }
    return markdown
  }

  private async readBlocks(sourcePath: string): Promise<ResumeBlock[]> {
    return parseResumeMarkdown(await this.readSource(sourcePath))
  }
}
