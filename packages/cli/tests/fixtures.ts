/**
 * Shared inputs for the CLI tests.
 *
 * One deposit, a GBP purchase and part-disposal of ABC, and a USD
 * dividend; the position section reports ABC short and an unheld QQQ.
 */

export const LEDGER_EXPORT = [
  '"HEADER","TRNT","TradeID","TradeDate","Symbol","Description","AssetClass","Buy/Sell","Quantity","Proceeds","IBCommission","CurrencyPrimary"',
  '"DATA","TRNT","T1","2024-03-05","ABC","ABC PLC","STK","BUY","10","-1000","0","GBP"',
  '"DATA","TRNT","T2","2024-03-06","ABC","ABC PLC","STK","SELL","-4","500","-1","GBP"',
  '"HEADER","CTRN","TransactionID","Date/Time","Type","Symbol","Description","Amount","Currency"',
  '"DATA","CTRN","C1","2024-03-10","Dividends","XYZ","XYZ CASH DIV","12.50","USD"',
  '"DATA","CTRN","C3","2024-03-01","Deposits/Withdrawals","","CASH RECEIPT","5000","GBP"',
  '"HEADER","POST","Symbol","AssetClass","Quantity","CostBasisMoney","CurrencyPrimary"',
  '"DATA","POST","ABC","STK","5","500","GBP"',
  '"DATA","POST","QQQ","STK","3","300","GBP"',
].join("\n");

export const RATES = { "2024-03": { USD: "1.25" } } as const;

export const SECONDARY_LEDGER = [
  "date,amount,direction,reference",
  "2024-03-15,300.00,received,Loan in",
  "2025-01-05,50.00,received,Late",
].join("\n");
