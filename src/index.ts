#!/usr/bin/env node

import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import gradient from 'gradient-string';
import ora from 'ora';
import path from 'path';
import { AdminService } from './adminService.js';
import { type ScannerConfig, loadConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { describeError, isScannerError } from './errors.js';
import type { HistoryFilter, HistoryPeriod, HistoryView } from './history.js';
import { PackingSession } from './packingSession.js';
import { buildPalletSummary, exportCsv, exportWorkbook } from './reports.js';
import { createAdapter } from './storage/index.js';
import type { PersistenceAdapter } from './storage/persistence.js';
import type { CompleteType, Drum, MaterialStatus, Pallet, PalletState } from './types.js';

const STATE_LABELS: Record<PalletState, string> = {
  EMPTY: chalk.dim('empty'),
  IN_PROGRESS: chalk.yellow('in progress'),
  FULL: chalk.green('full')
};

function reportError(error: unknown): void {
  if (isScannerError(error)) {
    console.log(chalk.red(`\n✖ ${error.message}\n`));
    return;
  }
  console.error(chalk.red.bold('\n❌ Unexpected error:'), describeError(error));
  if (error instanceof Error && error.cause) {
    console.error(chalk.dim(`   cause: ${describeError(error.cause)}`));
  }
  console.log('');
}

async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  const spinner = ora({ text, color: 'cyan' }).start();
  try {
    const result = await task();
    spinner.stop();
    return result;
  } catch (error) {
    spinner.fail(chalk.red(text));
    throw error;
  }
}

class ScannerConsole {
  private readonly session: PackingSession;
  private readonly admin: AdminService;

  constructor(
    private readonly store: PersistenceAdapter,
    private readonly config: ScannerConfig
  ) {
    this.session = new PackingSession(store);
    this.admin = new AdminService(store);
  }

  private showBanner(): void {
    console.clear();
    const title = gradient.pastel.multiline([
      '╔═══════════════════════════════════════════════╗',
      '║                                               ║',
      '║     DRUM PALLET SCANNER                       ║',
      '║     Scan, Pack & Seal Pallets                 ║',
      '║                                               ║',
      '╚═══════════════════════════════════════════════╝'
    ].join('\n'));

    console.log('\n' + title + '\n');
  }

  async initialize(): Promise<void> {
    this.showBanner();

    const counter = await withSpinner(`Connecting to ${this.store.name} backend...`, () =>
      this.admin.counter.current()
    );

    const statusTable = new Table({
      style: { head: ['cyan'] },
      colWidths: [25, 40]
    });
    statusTable.push(
      ['💾 Backend', chalk.cyan(this.store.name)],
      ['👷 Operator', this.config.operator ? chalk.blue(this.config.operator) : chalk.dim('not set')],
      ['📟 Device', chalk.blue(this.config.deviceId)],
      ['🔢 Pallet counter', chalk.magenta(String(counter))]
    );
    console.log(statusTable.toString());
    console.log('');

    if (!this.store.atomic) {
      console.warn(
        chalk.yellow(
          `⚠️  The ${this.store.name} backend cannot commit several rows atomically. ` +
            'Run a single station against it; failed saves are rolled back row by row.\n'
        )
      );
    }
  }

  async run(): Promise<void> {
    await this.initialize();

    let continueRunning = true;
    while (continueRunning) {
      try {
        continueRunning = await this.showMenu();
      } catch (error) {
        reportError(error);
      }
    }
  }

  async showMenu(): Promise<boolean> {
    const { action } = await inquirer.prompt<{ action: string }>([
      {
        type: 'list',
        name: 'action',
        message: chalk.bold.cyan('What would you like to do?'),
        default: 'pack',
        choices: [
          new inquirer.Separator(chalk.dim('— Packing —')),
          { name: chalk.green('📦  Pack drums onto a pallet'), value: 'pack' },
          { name: chalk.cyan('📋  Material overview'), value: 'overview' },
          new inquirer.Separator(),
          new inquirer.Separator(chalk.dim('— Admin —')),
          { name: chalk.magenta('🔢  Set pallet counter'), value: 'counter' },
          { name: chalk.magenta('🧪  Add / edit material'), value: 'material' },
          { name: chalk.magenta('✉️   Report email'), value: 'email' },
          new inquirer.Separator(),
          new inquirer.Separator(chalk.dim('— History —')),
          { name: chalk.blue('🔍  Search drum'), value: 'search' },
          { name: chalk.blue('🧾  Pallet summary'), value: 'summary' },
          { name: chalk.blue('📊  History & export'), value: 'history' },
          new inquirer.Separator(),
          { name: chalk.red('🚪  Exit'), value: 'exit' }
        ]
      }
    ]);

    switch (action) {
      case 'pack':
        await this.packMaterial();
        return true;
      case 'overview':
        await this.showOverview();
        return true;
      case 'counter':
        await this.setCounter();
        return true;
      case 'material':
        await this.editMaterial();
        return true;
      case 'email':
        await this.setReportEmail();
        return true;
      case 'search':
        await this.searchDrum();
        return true;
      case 'summary':
        await this.showPalletSummary();
        return true;
      case 'history':
        await this.showHistory();
        return true;
      default:
        return false;
    }
  }

  async showOverview(): Promise<void> {
    const statuses = await withSpinner('Loading materials...', () => this.session.overview());
    if (statuses.length === 0) {
      console.log(chalk.yellow('\nNo active materials. Add one from the admin menu.\n'));
      return;
    }

    const table = new Table({
      head: ['Material', 'Description', 'Drums', 'State', 'Prefix'],
      style: { head: ['cyan'], border: ['grey'] }
    });
    for (const status of statuses) {
      table.push([
        status.material.materialCode,
        status.material.description,
        `${status.count}/${status.material.maxQty}`,
        STATE_LABELS[status.state],
        status.material.prefix
      ]);
    }
    console.log('\n' + table.toString() + '\n');
  }

  private async pickMaterial(): Promise<string | null> {
    const statuses = await withSpinner('Loading materials...', () => this.session.overview());
    if (statuses.length === 0) {
      console.log(chalk.yellow('\nNo active materials. Add one from the admin menu.\n'));
      return null;
    }

    const { materialCode } = await inquirer.prompt<{ materialCode: string }>([
      {
        type: 'list',
        name: 'materialCode',
        message: chalk.bold('Select material:'),
        prefix: '🧪',
        choices: [
          ...statuses.map(status => ({
            name: `${status.material.materialCode}  ${chalk.dim(status.material.description)}  ${chalk.cyan(
              `${status.count}/${status.material.maxQty}`
            )}`,
            value: status.material.materialCode
          })),
          { name: chalk.dim('← Back'), value: '' }
        ]
      }
    ]);
    return materialCode || null;
  }

  private showStatusBox(status: MaterialStatus): void {
    const { material } = status;
    console.log(
      boxen(
        `${chalk.bold.white(material.materialCode)}  ${chalk.dim(material.description)}\n` +
          `${chalk.cyan(`Drums: ${status.count}/${material.maxQty}`)}  ` +
          `${STATE_LABELS[status.state]}  ` +
          `${chalk.blue(`Prefix: ${material.prefix || '—'}`)}`,
        {
          padding: { top: 0, bottom: 0, left: 1, right: 1 },
          borderStyle: 'round',
          borderColor: status.state === 'FULL' ? 'green' : 'cyan'
        }
      )
    );
  }

  async packMaterial(): Promise<void> {
    const materialCode = await this.pickMaterial();
    if (!materialCode) {
      return;
    }

    for (;;) {
      const status = await this.session.status(materialCode);
      if (!status) {
        console.log(chalk.yellow(`\nMaterial ${materialCode} is no longer available.\n`));
        return;
      }
      console.log('');
      this.showStatusBox(status);

      const { action } = await inquirer.prompt<{ action: string }>([
        {
          type: 'list',
          name: 'action',
          message: chalk.bold('Next step:'),
          default: status.canGenerateFull ? 'full' : 'scan',
          choices: [
            { name: chalk.green('📥  Scan drum'), value: 'scan' },
            { name: chalk.red('↩️   Undo last scan'), value: 'undo', disabled: status.count === 0 },
            { name: chalk.cyan('📃  List drums on pallet'), value: 'list', disabled: status.count === 0 },
            {
              name: chalk.green('✅  Generate full pallet'),
              value: 'full',
              disabled: status.canGenerateFull ? false : 'not full'
            },
            {
              name: chalk.yellow('🟨  Generate incomplete pallet'),
              value: 'incomplete',
              disabled: status.canGenerateIncomplete ? false : 'not allowed'
            },
            { name: chalk.dim('← Back'), value: 'back' }
          ]
        }
      ]);

      try {
        switch (action) {
          case 'scan':
            await this.scanDrum(materialCode);
            break;
          case 'undo':
            await this.undoScan(materialCode);
            break;
          case 'list':
            this.printDrums(await this.session.activeDrums(materialCode));
            break;
          case 'full':
          case 'incomplete':
            await this.generatePallet(materialCode, action === 'full' ? 'FULL' : 'INCOMPLETE');
            break;
          default:
            return;
        }
      } catch (error) {
        reportError(error);
      }
    }
  }

  private async scanDrum(materialCode: string): Promise<void> {
    const answers = await inquirer.prompt<{ raw: string; labelMaterialCode: string; standardQty: string }>([
      {
        type: 'input',
        name: 'raw',
        message: chalk.bold('Scan drum (type + number):'),
        prefix: '📥',
        validate: (input: string) => input.trim().length > 0 || 'Scan is required'
      },
      {
        type: 'input',
        name: 'labelMaterialCode',
        message: chalk.bold('Material code from label:'),
        prefix: '🏷️',
        filter: (input: string) => input.trim()
      },
      {
        type: 'input',
        name: 'standardQty',
        message: chalk.bold('Standard quantity:'),
        prefix: '🔢',
        default: ''
      }
    ]);

    const drum = await withSpinner('Saving scan...', () =>
      this.session.scan(materialCode, answers.raw, {
        labelMaterialCode: answers.labelMaterialCode,
        standardQty: answers.standardQty,
        operator: this.config.operator,
        deviceId: this.config.deviceId
      })
    );
    console.log(chalk.green(`✓ Drum ${drum.drumNumber} (${drum.drumType}) added`));
  }

  private async undoScan(materialCode: string): Promise<void> {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.yellow('Remove the last scanned drum?'),
        default: false
      }
    ]);
    if (!confirm) {
      return;
    }

    const result = await withSpinner('Removing last scan...', () => this.session.undo(materialCode));
    if (result.removed) {
      console.log(chalk.green(`✓ Drum ${result.drum.drumNumber} removed`));
    } else {
      console.log(chalk.yellow('No active drums to remove.'));
    }
  }

  private async generatePallet(materialCode: string, completeType: CompleteType): Promise<void> {
    const pallet = await withSpinner('Generating pallet...', () => this.session.generate(materialCode, completeType));
    const details = await this.admin.palletDetails(pallet.palletId);
    this.printPalletSummary(pallet, details?.drums ?? []);
  }

  private printPalletSummary(pallet: Pallet, drums: Drum[]): void {
    const summary = pallet.emailSubject
      ? { subject: pallet.emailSubject, body: pallet.emailBody }
      : buildPalletSummary(pallet, drums);
    console.log(
      boxen(`${chalk.bold(summary.subject)}\n\n${summary.body}`, {
        padding: 1,
        margin: { top: 1, bottom: 1 },
        borderStyle: 'double',
        borderColor: pallet.completeType === 'FULL' ? 'green' : 'yellow',
        title: chalk.bold.green(`PALLET ${pallet.palletId}`),
        titleAlignment: 'center'
      })
    );
  }

  private printDrums(drums: Drum[]): void {
    const table = new Table({
      head: ['Drum Number', 'Type', 'Material', 'Std Qty', 'Status', 'Pallet', 'Scanned'],
      style: { head: ['cyan'], border: ['grey'] }
    });
    for (const drum of drums) {
      table.push([
        drum.drumNumber,
        drum.drumType,
        drum.materialCode,
        drum.standardQty,
        drum.status === 'ACTIVE' ? chalk.yellow(drum.status) : chalk.green(drum.status),
        drum.palletId,
        drum.timestamp
      ]);
    }
    console.log('\n' + table.toString() + '\n');
  }

  async setCounter(): Promise<void> {
    const current = await this.admin.counter.current();
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message: chalk.bold(`New pallet counter (current ${current}):`),
        prefix: '🔢',
        default: String(current)
      }
    ]);
    const parsed = Number(value.trim());
    await this.admin.setCounter(parsed);
    console.log(chalk.green(`✓ Pallet counter set to ${parsed}\n`));
  }

  async editMaterial(): Promise<void> {
    const materials = await this.admin.listMaterials();
    const { materialCode } = await inquirer.prompt<{ materialCode: string }>([
      {
        type: 'list',
        name: 'materialCode',
        message: chalk.bold('Material:'),
        choices: [
          { name: chalk.green('➕  New material'), value: '' },
          ...materials.map(material => ({
            name: `${material.materialCode}  ${chalk.dim(material.description)}${
              material.active ? '' : chalk.red(' (inactive)')
            }`,
            value: material.materialCode
          }))
        ]
      }
    ]);
    const existing = materials.find(material => material.materialCode === materialCode);

    const answers = await inquirer.prompt<{
      materialCode: string;
      description: string;
      maxQty: string;
      prefix: string;
      allowIncomplete: boolean;
      active: boolean;
    }>([
      {
        type: 'input',
        name: 'materialCode',
        message: chalk.bold('Material code:'),
        default: existing?.materialCode ?? '',
        when: () => !existing
      },
      { type: 'input', name: 'description', message: chalk.bold('Description:'), default: existing?.description ?? '' },
      {
        type: 'input',
        name: 'maxQty',
        message: chalk.bold('Drums per pallet:'),
        default: String(existing?.maxQty ?? 1)
      },
      { type: 'input', name: 'prefix', message: chalk.bold('Pallet id prefix:'), default: existing?.prefix ?? '' },
      {
        type: 'confirm',
        name: 'allowIncomplete',
        message: chalk.bold('Allow incomplete pallets?'),
        default: existing?.allowIncomplete ?? false
      },
      { type: 'confirm', name: 'active', message: chalk.bold('Active?'), default: existing?.active ?? true }
    ]);

    const { created, material } = await this.admin.saveMaterial({
      materialCode: existing?.materialCode ?? answers.materialCode,
      description: answers.description,
      maxQty: Number(answers.maxQty.trim()),
      prefix: answers.prefix,
      allowIncomplete: answers.allowIncomplete,
      active: answers.active
    });
    console.log(chalk.green(`✓ Material ${material.materialCode} ${created ? 'created' : 'updated'}\n`));
  }

  async setReportEmail(): Promise<void> {
    const settings = await this.admin.getSettings();
    const { email } = await inquirer.prompt<{ email: string }>([
      {
        type: 'input',
        name: 'email',
        message: chalk.bold('Reports email:'),
        prefix: '✉️',
        default: settings.reportEmail
      }
    ]);
    await this.admin.setReportEmail(email);
    console.log(chalk.green('✓ Reports email saved\n'));
  }

  async searchDrum(): Promise<void> {
    const { drumNumber } = await inquirer.prompt<{ drumNumber: string }>([
      { type: 'input', name: 'drumNumber', message: chalk.bold('Drum number:'), prefix: '🔍' }
    ]);
    const drum = await this.admin.searchDrum(drumNumber);
    if (!drum) {
      console.log(chalk.yellow(`\nDrum ${drumNumber.trim()} not found.\n`));
      return;
    }
    this.printDrums([drum]);
  }

  async showPalletSummary(): Promise<void> {
    const { palletId } = await inquirer.prompt<{ palletId: string }>([
      { type: 'input', name: 'palletId', message: chalk.bold('Pallet id:'), prefix: '🧾' }
    ]);
    const details = await this.admin.palletDetails(palletId);
    if (!details) {
      console.log(chalk.yellow(`\nPallet ${palletId.trim()} not found.\n`));
      return;
    }
    this.printPalletSummary(details.pallet, details.drums);
  }

  async showHistory(): Promise<void> {
    const answers = await inquirer.prompt<{
      period: HistoryPeriod;
      from: string;
      to: string;
      materialFilter: string;
    }>([
      {
        type: 'list',
        name: 'period',
        message: chalk.bold('Period:'),
        choices: [
          { name: 'All', value: 'all' },
          { name: 'Today', value: 'today' },
          { name: 'This month', value: 'month' },
          { name: 'This year', value: 'year' },
          { name: 'Date range', value: 'range' }
        ]
      },
      {
        type: 'input',
        name: 'from',
        message: chalk.bold('From (YYYY-MM-DD):'),
        when: current => current.period === 'range'
      },
      {
        type: 'input',
        name: 'to',
        message: chalk.bold('To (YYYY-MM-DD):'),
        when: current => current.period === 'range'
      },
      { type: 'input', name: 'materialFilter', message: chalk.bold('Material code filter:'), default: '' }
    ]);

    const filter: HistoryFilter = {
      period: answers.period,
      from: answers.from,
      to: answers.to,
      materialFilter: answers.materialFilter
    };
    const view = await withSpinner('Loading history...', () => this.admin.history(filter));
    this.printHistory(view);

    const { exportKind } = await inquirer.prompt<{ exportKind: string }>([
      {
        type: 'list',
        name: 'exportKind',
        message: chalk.bold('Export?'),
        choices: [
          { name: 'No', value: 'none' },
          { name: 'CSV (pallets.csv + drums.csv)', value: 'csv' },
          { name: 'Excel workbook', value: 'xlsx' }
        ]
      }
    ]);
    if (exportKind === 'none') {
      return;
    }

    const stamp = new Date().toISOString().slice(0, 10);
    if (exportKind === 'csv') {
      const files = await exportCsv(path.join(this.config.reportDir, `report_${stamp}`), view);
      console.log(chalk.green(`✓ Exported ${files.join(', ')}`));
    } else {
      const file = await exportWorkbook(path.join(this.config.reportDir, `report_${stamp}.xlsx`), view);
      console.log(chalk.green(`✓ Exported ${file}`));
    }

    const { reportEmail } = await this.admin.getSettings();
    if (reportEmail) {
      console.log(chalk.dim(`  Reports email: ${reportEmail}\n`));
    }
  }

  private printHistory(view: HistoryView): void {
    const pallets = new Table({
      head: ['Pallet', 'Material', 'Description', 'Drums', 'Type', 'Created'],
      style: { head: ['cyan'], border: ['grey'] }
    });
    for (const pallet of view.pallets) {
      pallets.push([
        pallet.palletId,
        pallet.materialCode,
        pallet.description,
        String(pallet.count),
        pallet.completeType,
        pallet.createdAt
      ]);
    }
    console.log(chalk.bold(`\nPallets (${view.pallets.length})`));
    console.log(pallets.toString());
    console.log(chalk.bold(`\nDrums (${view.drums.length})`));
    this.printDrums(view.drums);
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

function printHelp(): void {
  console.log(`
Usage:
  drum-pallet-scanner [command]

Commands:
  overview         Print active materials and their open pallets
  -h, --help       Show this help menu

Environment:
  SCANNER_BACKEND  sqlite (default), sheets, script or memory
  OPERATOR         Operator name recorded on scans
  DEVICE_ID        Station id recorded on scans (default: host name)
`.trim());
  console.log('');
}

async function main(args: string[]): Promise<void> {
  await loadDotEnv();
  const config = loadConfig();
  const store = await createAdapter(config);
  const scanner = new ScannerConsole(store, config);
  try {
    if (args[0] === 'overview') {
      await scanner.showOverview();
    } else {
      await scanner.run();
    }
  } finally {
    await scanner.close();
  }
}

// Main entry point
const args = process.argv.slice(2).map(arg => arg.toLowerCase());
if (args.includes('-h') || args.includes('--help') || args.includes('help')) {
  printHelp();
  process.exit(0);
} else if (args.length > 0 && args[0] !== 'overview') {
  console.log(chalk.red(`Unknown command: ${args.join(' ')}`));
  printHelp();
  process.exit(1);
} else {
  main(args).catch(error => {
    reportError(error);
    process.exit(1);
  });
}
