/**
 * selectors.ts
 *
 * Every Banner "Enter CRNs" locator in one place. Buttons are matched as either
 * <button> or <input type=button|submit> because Banner renders both.
 */

function buttonByText(text: string): string {
  return (
    `//button[normalize-space()='${text}']` +
    ` | //input[@type='button' and @value='${text}']` +
    ` | //input[@type='submit' and @value='${text}']`
  );
}

export const SELECTORS = {
  enterCrnsTab: "//a[normalize-space()='Enter CRNs']",
  // rows are txt_crn1, txt_crn2, ...; fall back to the input following the "CRN" label
  crnInputs: "//input[starts-with(@id,'txt_crn')] | //label[normalize-space()='CRN']/following::input[1]",
  addAnotherCrn: `${buttonByText('Add Another CRN')} | //*[@id='addAnotherCRN']`,
  addToSummary: buttonByText('Add to Summary'),
  submit: buttonByText('Submit'),
  // Banner shows errors in an alert region or a notification panel
  messages: [
    "//*[@role='alert']",
    "//*[contains(@class,'alert')]",
    "//*[contains(@class,'notification')]",
    "//*[contains(@class,'messages')]",
  ].join(' | '),
  dismissMessage: "//*[contains(@class,'notification')]//button[contains(@class,'close') or @title='Close']",
  summaryRows: '//table//tr',
} as const;
