import * as fs from 'fs';
import * as path from 'path';
import { getDraftStats } from '../db/database';
import { getDataDir } from '../config';
import { DraftStats } from '../types';
import { logger } from './logger';

export class ReportGenerator {
    generateReport(now?: Date): DraftStats {
        return getDraftStats(now);
    }

    /**
     * Display report in console
     */
    displayReport(report: DraftStats): void {
        logger.info('='.repeat(60));
        logger.info('EMAIL DRAFT REPORT');
        logger.info('='.repeat(60));
        logger.info(`Generated at: ${report.generatedAt.toISOString()}`);

        logger.info('SUMMARY');
        logger.info('-'.repeat(40));
        logger.info(`Total emails: ${report.totalEmails}`);
        logger.info(`Sent: ${report.totalSent} (${report.successRate.toFixed(1)}%)`);
        logger.info(`Drafts: ${report.totalDrafts}`);
        logger.info(`Failed: ${report.totalFailed}`);
        logger.info(`Created in the last 7 days: ${report.recentActivity}`);

        if (report.popularTones.length > 0) {
            logger.info('TONES');
            logger.info('-'.repeat(40));
            for (const { tone, count } of report.popularTones) {
                logger.info(`${tone}: ${count}`);
            }
        }

        logger.info('MONTHLY');
        logger.info('-'.repeat(40));
        for (const month of report.monthlyStats) {
            logger.info(`${month.month}: sent ${month.sent} | drafts ${month.drafts}`);
        }

        logger.info('='.repeat(60));
    }

    /**
     * Save report to file
     */
    saveReport(report: DraftStats, dir: string = getDataDir()): string {
        const timestamp = report.generatedAt.toISOString().replace(/[:.]/g, '-');
        const filePath = path.join(dir, `report-${timestamp}.json`);

        fs.writeFileSync(filePath, JSON.stringify(report, null, 2));
        return filePath;
    }
}
