import 'dotenv/config';
import { mastra } from '../src/mastra';
import { INITIAL_CASH_BALANCE, INITIAL_HOLDINGS } from '../src/mastra/config';
import { rebalanceOutputSchema } from '../src/mastra/workflows/rebalance-workflow';

async function runRebalance() {
  const execute = process.argv.includes('--execute');
  const diversified = process.argv.includes('--diversified');

  console.log('=== Running Rebalance Workflow ===\n');
  console.log(`Holdings: ${INITIAL_HOLDINGS.map((h) => `${h.symbol} x${h.shares}`).join(', ')}`);
  console.log(`Cash: $${INITIAL_CASH_BALANCE.toLocaleString()}`);
  console.log(`Execute: ${execute ? 'yes' : 'no (plan only)'}\n`);

  const workflow = mastra.getWorkflow('rebalanceWorkflow');
  const run = await workflow.createRunAsync();

  const startTime = Date.now();
  const result = await run.start({
    inputData: {
      holdings: INITIAL_HOLDINGS,
      cash: INITIAL_CASH_BALANCE,
      config: {
        useAdvisor: true,
        execute,
        fallbackStrategy: diversified ? 'diversified' : 'rebalance',
      },
    },
  });
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);

  if (result.status !== 'success') {
    console.error(`Workflow finished with status: ${result.status}`);
    process.exitCode = 1;
    return;
  }

  const output = rebalanceOutputSchema.parse(result.result);
  console.log(`Completed in ${elapsed}s\n`);

  console.log('=== Market ===');
  console.log(`Sentiment: ${output.market.sentiment} | Risk: ${output.market.risk} | Stance: ${output.market.recommendation}`);
  for (const insight of output.market.insights) {
    console.log(`  - ${insight}`);
  }
  for (const warning of output.warnings) {
    console.log(`  ! ${warning}`);
  }

  if (output.advisorAnalysis) {
    console.log(`\nAdvisor: ${output.advisorAnalysis}`);
  }

  console.log(`\n=== Plan (${output.source}) ===`);
  if (output.recommendations.length === 0) {
    console.log('Nothing to do.');
  }
  output.recommendations.forEach((rec, i) => {
    console.log(`${i + 1}. [${rec.priority}] ${rec.action} ${rec.shares} ${rec.symbol} (${rec.category}) $${rec.cost.toFixed(2)}`);
    console.log(`   ${rec.reasoning}`);
    for (const reason of rec.detailedReasons) {
      console.log(`   • ${reason}`);
    }
  });

  const buy = output.recommendations.filter((r) => r.action === 'BUY').reduce((sum, r) => sum + r.cost, 0);
  const sell = output.recommendations.filter((r) => r.action === 'SELL').reduce((sum, r) => sum + r.cost, 0);
  console.log(`\nBuy $${buy.toFixed(0)}, Sell $${sell.toFixed(0)}`);
  console.log(`Account: $${output.preRebalance.totalValue.toFixed(2)} (${output.preRebalance.uninvestedPct.toFixed(1)}% uninvested)`);

  if (output.execution) {
    console.log('\n=== Execution ===');
    console.log(`Invested $${output.execution.totalInvested.toFixed(2)}, sold $${output.execution.totalSold.toFixed(2)}`);
    for (const rejection of output.execution.rejections) {
      console.log(`  ✗ ${rejection.code}: ${rejection.message}`);
    }
    console.log(`Cash left: $${output.execution.postRebalance.cash.toFixed(2)}`);
  }
}

runRebalance().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
